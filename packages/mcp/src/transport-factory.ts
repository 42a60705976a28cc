import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  ConfigError,
  type Logger,
  McpProtocol,
  UnsupportedProtocolError
} from '@registry-bridge/core';
import type { McpTarget } from './endpoint.js';

export type McpTransportFactory = (
  target: McpTarget,
  logger: Logger
) => Transport | Promise<Transport>;

function parseUrl(target: McpTarget): URL {
  try {
    return new URL(target.url);
  } catch (error) {
    throw new ConfigError(`Invalid URL for MCP server ${target.name}: ${target.url}`, {
      cause: error
    });
  }
}

/**
 * Build the SDK client transport matching the target's protocol
 */
export const createMcpTransport: McpTransportFactory = (target, logger) => {
  const url = parseUrl(target);
  const requestInit: RequestInit | undefined = target.headers
    ? { headers: target.headers }
    : undefined;

  switch (target.protocol) {
    case McpProtocol.SSE:
      logger.debug(`Creating SSEClientTransport for ${target.name}`, { url: target.url });
      return new SSEClientTransport(url, { requestInit });
    case McpProtocol.STREAMABLE:
      logger.debug(`Creating StreamableHTTPClientTransport for ${target.name}`, {
        url: target.url
      });
      return new StreamableHTTPClientTransport(url, { requestInit });
    default:
      throw new UnsupportedProtocolError(target.protocol);
  }
};
