/**
 * @registry-bridge/a2a - agent cards from the registry, remote A2A agents and
 * agent registration
 */

export {
  DEFAULT_PREFERRED_TRANSPORT,
  DEFAULT_PROTOCOL_VERSION,
  parseAgentCard,
  type ParsedAgentCard,
  toA2aCard,
  toRegistryCard
} from './card-converter.js';
export {
  type AgentCardResolver,
  DEFAULT_CARD_TIMEOUT_MS,
  FileAgentCardResolver,
  type FileAgentCardResolverOptions,
  FixedAgentCardResolver,
  WellKnownAgentCardResolver,
  type WellKnownAgentCardResolverOptions
} from './card-resolver.js';
export {
  AgentCardCache,
  type AgentCardCacheOptions,
  type CardRefreshFailedHandler,
  RegistryAgentCardResolver
} from './agent-card-cache.js';
export {
  A2aAgent,
  type A2aAgentOptions,
  type A2aClientFactory,
  type A2aClientLike,
  type A2aStreamEvent,
  createSdkClient
} from './a2a-agent.js';
export {
  buildRegistrationPlan,
  type BuildRegistrationPlanOptions,
  DEFAULT_ENDPOINT_PATH,
  DEFAULT_ENDPOINT_PROTOCOL,
  type DeployInfo,
  endpointUrl,
  type EnvSource,
  mergeTransportProperties,
  parseAgentRegistration,
  type RegistrationPlan,
  resolveTransportProperties,
  TRANSPORT_ENV_PREFIX,
  type TransportEndpoint,
  transportPropertiesFromEnv
} from './registration.js';
export {
  type AgentRegistration,
  AgentRegistrar,
  type AgentRegistrarOptions,
  type AgentRegistrationTarget
} from './registrar.js';
export {
  type ConfiguredAgentsOptions,
  createConfiguredA2aAgents,
  VersionedAgentCardResolver
} from './configured-agents.js';
