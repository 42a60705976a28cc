import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import {
  BRIDGE_VERSION,
  createSilentLogger,
  type Logger,
  type McpCallResult,
  type McpToolInfo,
  sleep,
  ToolInvocationError,
  toErrorMessage,
  TransportError,
  withTimeout
} from '@registry-bridge/core';
import type { McpTarget } from './endpoint.js';
import { createMcpTransport, type McpTransportFactory } from './transport-factory.js';

/**
 * An initialized connection to one MCP server
 */
export type McpSession = {
  listTools(): Promise<McpToolInfo[]>;
  callTool(name: string, args: Record<string, unknown>): Promise<McpCallResult>;
  close(): Promise<void>;
};

export type McpConnector = (target: McpTarget) => Promise<McpSession>;

// ---- connect with retry ----------------------------------------------------

export async function connectWithRetry(args: {
  id: string;
  createTransport: () => Transport | Promise<Transport>;
  maxRetries?: number;
  connectTimeoutMs?: number;
  logger: Logger;
}): Promise<Client> {
  const { id, createTransport, maxRetries = 3, connectTimeoutMs, logger } = args;

  let lastError: unknown;

  for (let i = 0; i < maxRetries; i++) {
    const client = new Client(
      {
        name: `registry-bridge-${id}`,
        version: BRIDGE_VERSION
      },
      {
        capabilities: {}
      }
    );
    try {
      const transport = await createTransport();
      await withTimeout(
        client.connect(transport),
        connectTimeoutMs,
        `Connection to ${id} timed out after ${connectTimeoutMs}ms`
      );
      logger.info(`Connected to ${id} on attempt ${i + 1}`);
      return client;
    } catch (error) {
      lastError = error;
      logger.warn(`Connection attempt ${i + 1} failed for ${id}`, {
        error: toErrorMessage(error),
        retriesLeft: maxRetries - i - 1
      });
      await client.close().catch((closeError: unknown) => {
        logger.debug(`Closing failed client for ${id} errored`, {
          error: toErrorMessage(closeError)
        });
      });
      if (i < maxRetries - 1) {
        const delay = 500 * 2 ** i;
        logger.debug(`Waiting ${delay}ms before retry...`);
        await sleep(delay);
      }
    }
  }

  throw new TransportError(`Failed to connect to ${id} after ${maxRetries} attempts`, {
    cause: lastError
  });
}

// ---- session ---------------------------------------------------------------

export function sessionFromClient(client: Client): McpSession {
  return {
    async listTools() {
      const { tools } = await client.listTools();
      return tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: { ...tool.inputSchema }
      }));
    },
    async callTool(name, args) {
      const raw = await client.callTool({ name, arguments: args });
      const parsed = CallToolResultSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ToolInvocationError(`Tool ${name} returned an unexpected result`, {
          cause: parsed.error
        });
      }
      const { content, isError } = parsed.data;
      return isError ? { content, isError: true } : { content };
    },
    close: () => client.close()
  };
}

export type SdkConnectorOptions = {
  createTransport?: McpTransportFactory;
  maxRetries?: number;
  connectTimeoutMs?: number;
  logger?: Logger;
};

/**
 * Connector backed by the MCP SDK client
 */
export function createSdkConnector(options: SdkConnectorOptions = {}): McpConnector {
  const createTransport = options.createTransport ?? createMcpTransport;
  const logger = options.logger ?? createSilentLogger();

  return async (target) => {
    const client = await connectWithRetry({
      id: target.name,
      createTransport: () => createTransport(target, logger),
      maxRetries: options.maxRetries,
      connectTimeoutMs: options.connectTimeoutMs,
      logger
    });
    return sessionFromClient(client);
  };
}
