/**
 * @registry-bridge/mcp - MCP servers discovered through the registry
 */

export {
  endpointUrl,
  type McpTarget,
  resolveMcpProtocol,
  resolveMcpTarget,
  selectEndpoint
} from './endpoint.js';
export { createMcpTransport, type McpTransportFactory } from './transport-factory.js';
export {
  connectWithRetry,
  createSdkConnector,
  type McpConnector,
  type McpSession,
  type SdkConnectorOptions,
  sessionFromClient
} from './connector.js';
export { type Closable, SessionHandle } from './session-handle.js';
export { overlayToolSpec, overlayToolSpecs } from './tool-spec.js';
export {
  McpServerManager,
  type McpServerManagerOptions,
  type RefreshFailedHandler
} from './server-manager.js';
export {
  createRegistryMcpClient,
  type CreateRegistryMcpClientOptions,
  RegistryMcpClient,
  type RegistryMcpClientOptions,
  type RefreshHook
} from './registry-mcp-client.js';
export {
  buildRegistryMcpTools,
  deriveToolDefinition,
  RegistryMcpTool
} from './registry-mcp-tool.js';
export { RegistryToolkit } from './registry-toolkit.js';
export {
  type ConfiguredServersOptions,
  registerBoundMcpClient,
  registerConfiguredMcpServers,
  toRegisterOptions
} from './configured-servers.js';
