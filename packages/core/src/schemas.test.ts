/**
 * Tests for configuration and descriptor schemas
 */

import { describe, expect, it } from 'vitest';
import { McpServerDetailSchema, RegistryAgentCardSchema } from './descriptors.js';
import {
  AgentRegistrationSchema,
  formatConfigError,
  RegistryConnectionSchema,
  safeParseConfig
} from './schemas.js';

describe('RegistryConnectionSchema', () => {
  it('should fill defaults', () => {
    expect(RegistryConnectionSchema.parse({})).toEqual({
      serverAddr: 'http://127.0.0.1:8848',
      namespaceId: 'public',
      contextPath: '/nacos',
      requestTimeoutMs: 30000,
      fetchTimeoutMs: 30000,
      pollIntervalMs: 10000
    });
  });

  it('should reject a poll interval under one second', () => {
    const result = RegistryConnectionSchema.safeParse({ pollIntervalMs: 500 });
    expect(result.success).toBe(false);
  });

  it('should reject a server address that is not a URL', () => {
    const result = RegistryConnectionSchema.safeParse({ serverAddr: 'localhost:8848' });
    expect(result.success).toBe(false);
  });
});

describe('BridgeConfigSchema', () => {
  it('should parse an empty config into defaults', () => {
    const result = safeParseConfig({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.mcpServers).toEqual({});
      expect(result.data.a2a).toEqual({ agents: {} });
      expect(result.data.registry.namespaceId).toBe('public');
    }
  });

  it('should parse server bindings and registration', () => {
    const result = safeParseConfig({
      mcpServers: { weather: { includeTools: ['forecast'], groupName: 'weather' } },
      a2a: {
        agents: { writer: { version: '1.2.0' } },
        registration: { transports: { jsonrpc: { host: '10.0.0.2', port: 9000 } } }
      }
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.mcpServers.weather).toEqual({
        includeTools: ['forecast'],
        groupName: 'weather',
        delayInitialize: false
      });
      expect(result.data.a2a.registration).toEqual({
        registerAsLatest: true,
        enabledRegisterEndpoint: true,
        transports: { jsonrpc: { host: '10.0.0.2', port: 9000 } }
      });
    }
  });

  it('should reject unknown keys in a server binding', () => {
    const result = safeParseConfig({ mcpServers: { weather: { url: 'http://x' } } });
    expect(result.success).toBe(false);
  });
});

describe('AgentRegistrationSchema', () => {
  it('should default both switches on', () => {
    expect(AgentRegistrationSchema.parse({})).toEqual({
      registerAsLatest: true,
      enabledRegisterEndpoint: true,
      transports: {}
    });
  });
});

describe('descriptor schemas', () => {
  it('should default an empty tool list', () => {
    const detail = McpServerDetailSchema.parse({
      name: 'weather',
      protocol: 'mcp-sse',
      toolSpec: {}
    });
    expect(detail.toolSpec).toEqual({ tools: [] });
  });

  it('should require a protocol on a server detail', () => {
    expect(McpServerDetailSchema.safeParse({ name: 'weather' }).success).toBe(false);
  });

  it('should default agent card description and version', () => {
    const card = RegistryAgentCardSchema.parse({ name: 'writer', url: 'http://10.0.0.2:9000' });
    expect(card.description).toBe('');
    expect(card.version).toBe('1.0.0');
  });
});

describe('formatConfigError', () => {
  it('should render one line per issue with its path', () => {
    const result = RegistryConnectionSchema.safeParse({ pollIntervalMs: 'fast' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatConfigError(result.error)).toBe(
        'Configuration validation failed:\npollIntervalMs: Expected number, received string'
      );
    }
  });
});
