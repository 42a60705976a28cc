/**
 * MCP servers running in the test process over the SDK's in-memory transport
 */

import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

export type TestToolHandler = (args: Record<string, unknown>) => Promise<string> | string;

export type TestTool = {
  name: string;
  description?: string;
  inputSchema?: { type: 'object'; properties?: Record<string, unknown>; required?: string[] };
  handler?: TestToolHandler;
  isError?: boolean;
};

export type TestMcpServer = {
  readonly name: string;
  /** Connect a fresh server instance and return the client side */
  createTransport(): Promise<Transport>;
  setTools(tools: TestTool[]): void;
  readonly connections: number;
  readonly openConnections: number;
};

export function createTestMcpServer(name: string, initialTools: TestTool[] = []): TestMcpServer {
  let tools = initialTools;
  let connections = 0;
  let openConnections = 0;

  const createTransport = async (): Promise<Transport> => {
    const server = new Server({ name, version: '1.0.0' }, { capabilities: { tools: {} } });

    server.setRequestHandler(ListToolsRequestSchema, () => ({
      tools: tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema ?? { type: 'object' as const }
      }))
    }));

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const tool = tools.find((candidate) => candidate.name === request.params.name);
      if (!tool) {
        throw new Error(`Unknown tool: ${request.params.name}`);
      }
      const text = tool.handler ? await tool.handler(request.params.arguments ?? {}) : tool.name;
      return {
        content: [{ type: 'text' as const, text }],
        isError: tool.isError
      };
    });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    server.onclose = () => {
      openConnections -= 1;
    };
    await server.connect(serverTransport);
    connections += 1;
    openConnections += 1;
    return clientTransport;
  };

  return {
    name,
    createTransport,
    setTools: (next) => {
      tools = next;
    },
    get connections() {
      return connections;
    },
    get openConnections() {
      return openConnections;
    }
  };
}

/**
 * Transport factory that routes each target URL to a test server
 */
export function transportsByUrl(
  servers: Record<string, TestMcpServer>
): (target: { url: string }) => Promise<Transport> {
  return async (target) => {
    const server = servers[target.url];
    if (!server) {
      throw new Error(`No test MCP server at ${target.url}`);
    }
    return server.createTransport();
  };
}
