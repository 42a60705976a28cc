/**
 * @registry-bridge/registry - registry clients and the descriptor cache
 */

export * from './types.js';
export { PushChannel, type PushChannelOptions } from './push-channel.js';
export { DependentRegistry, type RefreshFailure } from './dependent-registry.js';
export {
  ResourceCache,
  type ResourceCacheEvents,
  type ResourceCacheOptions
} from './resource-cache.js';
export { mapSource } from './map-source.js';
export { PollingSource, type PollingSourceOptions } from './polling-source.js';
export {
  AGENT_REGISTRATION_TYPE,
  type FetchLike,
  NACOS_API,
  NACOS_NOT_FOUND_CODE,
  NacosRegistryClient,
  type NacosRegistryClientOptions
} from './nacos-client.js';
export { RegistryClientPool, type RegistryClientFactory } from './client-pool.js';
