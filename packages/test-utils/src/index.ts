export {
  InMemoryDescriptorSource,
  InMemoryRegistryClient,
  type RegisteredEndpoints,
  type ReleasedCard
} from './in-memory-registry.js';
export { mcpServerDetail, registryAgentCard } from './fixtures.js';
export {
  createTestMcpServer,
  type TestMcpServer,
  type TestTool,
  type TestToolHandler,
  transportsByUrl
} from './mcp-server.js';
export { deferred, delay, waitFor, type WaitForOptions } from './wait-for.js';
