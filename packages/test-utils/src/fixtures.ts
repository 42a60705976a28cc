import type { McpServerDetail, RegistryAgentCard } from '@registry-bridge/core';

export function mcpServerDetail(overrides: Partial<McpServerDetail> = {}): McpServerDetail {
  return {
    name: 'weather',
    protocol: 'mcp-sse',
    description: 'Weather tools',
    version: '1.0.0',
    backendEndpoints: [{ address: '10.0.0.5', port: 8080, path: '/sse' }],
    toolSpec: { tools: [] },
    ...overrides
  };
}

export function registryAgentCard(overrides: Partial<RegistryAgentCard> = {}): RegistryAgentCard {
  return {
    name: 'writer',
    description: 'Writes short texts',
    version: '1.0.0',
    url: 'http://10.0.0.7:9000/a2a/',
    protocolVersion: '0.3.0',
    preferredTransport: 'JSONRPC',
    capabilities: { streaming: true },
    skills: [{ id: 'write', name: 'write', description: 'Write text', tags: ['text'] }],
    defaultInputModes: ['text'],
    defaultOutputModes: ['text'],
    ...overrides
  };
}
