import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { createLogger, type Logger, UnsupportedProtocolError } from '@registry-bridge/core';
import { beforeEach, describe, expect, it } from 'vitest';
import { createMcpTransport } from './transport-factory.js';

describe('createMcpTransport', () => {
  let lines: string[];
  let logger: Logger;

  beforeEach(() => {
    lines = [];
    logger = createLogger({ level: 'debug', output: (line) => lines.push(line) });
  });

  it('should build an SSE transport for mcp-sse', async () => {
    const transport = await createMcpTransport(
      { name: 'weather', protocol: 'mcp-sse', url: 'http://10.0.0.5:8080/sse' },
      logger
    );

    expect(transport).toBeInstanceOf(SSEClientTransport);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('Creating SSEClientTransport for weather');
  });

  it('should build a streamable HTTP transport for mcp-streamable', async () => {
    const transport = await createMcpTransport(
      {
        name: 'weather',
        protocol: 'mcp-streamable',
        url: 'http://10.0.0.5:8080/mcp',
        headers: { Authorization: 'Bearer test-token' }
      },
      logger
    );

    expect(transport).toBeInstanceOf(StreamableHTTPClientTransport);
  });

  it('should reject other protocols', () => {
    expect(() =>
      createMcpTransport({ name: 'local', protocol: 'stdio', url: 'http://localhost:1' }, logger)
    ).toThrow(new UnsupportedProtocolError('stdio'));
  });

  it('should reject malformed URLs', () => {
    expect(() =>
      createMcpTransport({ name: 'weather', protocol: 'mcp-sse', url: 'http://:bad' }, logger)
    ).toThrow('Invalid URL for MCP server weather: http://:bad');
  });
});
