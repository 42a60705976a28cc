/**
 * Configuration schemas for registry-bridge
 * Using Zod for runtime validation and type inference
 */

import { z } from 'zod';

// Constants
export const DEFAULT_SERVER_ADDR = 'http://127.0.0.1:8848';
export const DEFAULT_NAMESPACE = 'public';
export const DEFAULT_CONTEXT_PATH = '/nacos';
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000; // 30 seconds
export const DEFAULT_FETCH_TIMEOUT_MS = 30000; // 30 seconds
export const DEFAULT_POLL_INTERVAL_MS = 10000; // 10 seconds
export const MIN_POLL_INTERVAL_MS = 1000; // 1 second

/**
 * Registry connection schema
 */
export const RegistryConnectionSchema = z.object({
  serverAddr: z
    .string()
    .url()
    .default(DEFAULT_SERVER_ADDR)
    .describe('Base URL of the registry server'),
  namespaceId: z.string().min(1).default(DEFAULT_NAMESPACE).describe('Registry namespace'),
  contextPath: z.string().default(DEFAULT_CONTEXT_PATH).describe('HTTP context path of the API'),
  username: z.string().optional(),
  password: z.string().optional(),
  accessToken: z.string().optional().describe('Static token, skips login when set'),
  requestTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_REQUEST_TIMEOUT_MS)
    .describe('Timeout of a single registry HTTP request'),
  fetchTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_FETCH_TIMEOUT_MS)
    .describe('Bound on the initial subscribe-and-fetch of a resource'),
  pollIntervalMs: z
    .number()
    .int()
    .min(MIN_POLL_INTERVAL_MS)
    .default(DEFAULT_POLL_INTERVAL_MS)
    .describe('Interval between change checks of a watched resource')
});

/**
 * Binding of one registry MCP server into an agent toolkit
 */
export const McpServerBindingSchema = z
  .object({
    includeTools: z.array(z.string()).optional().describe('Only these tools are registered'),
    excludeTools: z.array(z.string()).optional().describe('These tools are skipped'),
    groupName: z.string().optional().describe('Toolkit group of the registered tools'),
    delayInitialize: z.boolean().default(false).describe('Connect on first use')
  })
  .strict();

/**
 * Transport attributes used to build an agent endpoint
 */
export const TransportPropertiesSchema = z
  .object({
    host: z.string().optional(),
    port: z.number().int().min(0).max(65535).optional(),
    path: z.string().optional(),
    protocol: z.string().optional(),
    query: z.string().optional(),
    supportTls: z.boolean().optional()
  })
  .strict();

/**
 * Agent registration properties
 */
export const AgentRegistrationSchema = z
  .object({
    registerAsLatest: z.boolean().default(true),
    enabledRegisterEndpoint: z.boolean().default(true),
    overwritePreferredTransport: z.string().optional(),
    transports: z.record(TransportPropertiesSchema).default({})
  })
  .strict();

export const RemoteAgentSchema = z
  .object({
    version: z.string().optional()
  })
  .strict();

export const A2aConfigSchema = z
  .object({
    agents: z.record(RemoteAgentSchema).default({}),
    registration: AgentRegistrationSchema.optional()
  })
  .strict();

/**
 * Main configuration schema
 */
export const BridgeConfigSchema = z
  .object({
    registry: RegistryConnectionSchema.default({}),
    mcpServers: z.record(McpServerBindingSchema).default({}),
    a2a: A2aConfigSchema.default({})
  })
  .strict();

/**
 * Inferred TypeScript types from schemas
 */
export type RegistryConnection = z.infer<typeof RegistryConnectionSchema>;
export type RegistryConnectionInput = z.input<typeof RegistryConnectionSchema>;
export type McpServerBinding = z.infer<typeof McpServerBindingSchema>;
export type TransportProperties = z.infer<typeof TransportPropertiesSchema>;
export type AgentRegistration = z.infer<typeof AgentRegistrationSchema>;
export type AgentRegistrationInput = z.input<typeof AgentRegistrationSchema>;
export type A2aConfig = z.infer<typeof A2aConfigSchema>;
export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;

export function parseConfig(config: unknown): BridgeConfig {
  return BridgeConfigSchema.parse(config);
}

export function safeParseConfig(config: unknown) {
  return BridgeConfigSchema.safeParse(config);
}

export function safeParseRegistryConnection(config: unknown) {
  return RegistryConnectionSchema.safeParse(config);
}

/**
 * Format Zod error messages for human readability
 */
export function formatConfigError(error: z.ZodError): string {
  const messages = error.errors.map((err) => {
    const path = err.path.join('.');
    const message = err.message;
    return path ? `${path}: ${message}` : message;
  });
  return `Configuration validation failed:\n${messages.join('\n')}`;
}
