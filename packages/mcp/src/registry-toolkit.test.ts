import type { McpServerDetail } from '@registry-bridge/core';
import {
  createTestMcpServer,
  InMemoryDescriptorSource,
  mcpServerDetail,
  type TestMcpServer,
  transportsByUrl
} from '@registry-bridge/test-utils';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createSdkConnector } from './connector.js';
import { createRegistryMcpClient, type RegistryMcpClient } from './registry-mcp-client.js';
import { RegistryToolkit } from './registry-toolkit.js';
import { McpServerManager } from './server-manager.js';

const PRIMARY_URL = 'http://10.0.0.5:8080/sse';
const SECONDARY_URL = 'http://10.0.0.6:8080/sse';

describe('RegistryToolkit', () => {
  let source: InMemoryDescriptorSource<McpServerDetail>;
  let manager: McpServerManager;
  let primary: TestMcpServer;
  let secondary: TestMcpServer;
  let client: RegistryMcpClient;
  let toolkit: RegistryToolkit;

  const moveTo = async (address: string) => {
    source.put('weather', mcpServerDetail({ backendEndpoints: [{ address, port: 8080, path: '/sse' }] }));
    await manager.drain();
  };

  beforeEach(async () => {
    source = new InMemoryDescriptorSource('mcp-server');
    source.seed('weather', mcpServerDetail());
    manager = new McpServerManager(source);
    primary = createTestMcpServer('weather', [
      { name: 'forecast' },
      { name: 'alerts' },
      { name: 'radar' }
    ]);
    secondary = createTestMcpServer('weather', [
      { name: 'forecast' },
      { name: 'tides' },
      { name: 'radar' }
    ]);
    client = await createRegistryMcpClient('weather', manager, {
      connector: createSdkConnector({
        maxRetries: 1,
        createTransport: transportsByUrl({ [PRIMARY_URL]: primary, [SECONDARY_URL]: secondary })
      })
    });
    toolkit = new RegistryToolkit();
  });

  afterEach(async () => {
    await client.close();
    await manager.close();
  });

  it('should register the tools of a registry client', async () => {
    const names = await toolkit.registerMcpClient(client, { groupName: 'weather' });

    expect(names).toEqual(['forecast', 'alerts', 'radar']);
    expect(toolkit.listTools('weather').map((tool) => tool.name)).toEqual([
      'forecast',
      'alerts',
      'radar'
    ]);
    expect(toolkit.isFollowing('weather')).toBe(true);
  });

  it('should re-register tools with the same filter and group after a refresh', async () => {
    await toolkit.registerMcpClient(client, { disableTools: ['radar'], groupName: 'weather' });
    const catalog = vi.fn();
    toolkit.onCatalogChange(catalog);

    await moveTo('10.0.0.6');

    expect(toolkit.getToolNames()).toEqual(['forecast', 'tides']);
    expect(toolkit.listTools('weather').map((tool) => tool.name)).toEqual(['forecast', 'tides']);
    expect(catalog).toHaveBeenCalledTimes(1);
    expect(catalog).toHaveBeenCalledWith(['forecast', 'tides']);
    await expect(toolkit.callTool('tides', {})).resolves.toEqual({
      content: [{ type: 'text', text: 'tides' }]
    });
  });

  it('should stop following a removed client', async () => {
    await toolkit.registerMcpClient(client);

    expect(toolkit.removeMcpClient('weather')).toEqual(['forecast', 'alerts', 'radar']);
    await moveTo('10.0.0.6');

    expect(toolkit.isFollowing('weather')).toBe(false);
    expect(toolkit.getToolNames()).toEqual([]);
  });

  it('should follow a client once when registered twice', async () => {
    await toolkit.registerMcpClient(client, { enableTools: ['forecast'] });
    await toolkit.registerMcpClient(client, { enableTools: ['radar'] });
    const catalog = vi.fn();
    toolkit.onCatalogChange(catalog);

    await moveTo('10.0.0.6');

    expect(catalog).toHaveBeenCalledTimes(1);
    expect(toolkit.getToolNames()).toEqual(['radar']);
  });

  it('should register plain MCP clients without following them', async () => {
    const plain = {
      name: 'static',
      listTools: async () => [{ name: 'echo', inputSchema: { type: 'object' } }],
      callTool: async () => ({ content: [{ type: 'text', text: 'echo' }] })
    };

    await toolkit.registerMcpClient(plain);

    expect(toolkit.getToolNames()).toEqual(['echo']);
    expect(toolkit.isFollowing('static')).toBe(false);
  });
});
