/**
 * Descriptor schemas for resources published in the registry
 *
 * Descriptors are immutable snapshots. A change in the registry produces a new
 * descriptor object; nothing in the bridge patches one in place.
 */

import { z } from 'zod';

/**
 * Network endpoint of an MCP server
 */
export const McpEndpointSchema = z.object({
  address: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  protocol: z.string().optional().describe('URL scheme, http when absent'),
  path: z.string().optional(),
  headers: z.record(z.string()).optional()
});

/**
 * Tool entry as stored by the registry
 */
export const RegistryMcpToolSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  inputSchema: z.record(z.unknown()).optional()
});

export const McpToolMetaSchema = z.object({
  enabled: z.boolean().optional()
});

export const McpToolSpecSchema = z.object({
  tools: z.array(RegistryMcpToolSchema).default([]),
  toolsMeta: z.record(McpToolMetaSchema).optional()
});

export const McpServerDetailSchema = z.object({
  id: z.string().optional(),
  name: z.string().min(1),
  description: z.string().optional(),
  protocol: z.string().min(1),
  frontProtocol: z.string().optional(),
  version: z.string().optional(),
  frontendEndpoints: z.array(McpEndpointSchema).optional(),
  backendEndpoints: z.array(McpEndpointSchema).optional(),
  toolSpec: McpToolSpecSchema.optional()
});

export const AgentInterfaceSchema = z.object({
  url: z.string(),
  transport: z.string()
});

export const AgentSkillSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().default(''),
  tags: z.array(z.string()).default([]),
  examples: z.array(z.string()).optional(),
  inputModes: z.array(z.string()).optional(),
  outputModes: z.array(z.string()).optional()
});

export const AgentCapabilitiesSchema = z.object({
  streaming: z.boolean().optional(),
  pushNotifications: z.boolean().optional(),
  stateTransitionHistory: z.boolean().optional()
});

export const AgentProviderSchema = z.object({
  organization: z.string(),
  url: z.string()
});

/**
 * Agent card as stored by the registry
 */
export const RegistryAgentCardSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  version: z.string().default('1.0.0'),
  url: z.string().optional(),
  protocolVersion: z.string().optional(),
  preferredTransport: z.string().optional(),
  additionalInterfaces: z.array(AgentInterfaceSchema).optional(),
  capabilities: AgentCapabilitiesSchema.optional(),
  skills: z.array(AgentSkillSchema).optional(),
  defaultInputModes: z.array(z.string()).optional(),
  defaultOutputModes: z.array(z.string()).optional(),
  provider: AgentProviderSchema.optional(),
  iconUrl: z.string().optional(),
  documentationUrl: z.string().optional(),
  supportsAuthenticatedExtendedCard: z.boolean().optional(),
  securitySchemes: z.record(z.unknown()).optional(),
  security: z.array(z.record(z.array(z.string()))).optional()
});

/**
 * One reachable address of a registered agent
 */
export const AgentEndpointSchema = z.object({
  transport: z.string().min(1),
  address: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  path: z.string().optional(),
  protocol: z.string().optional(),
  query: z.string().optional(),
  supportTls: z.boolean().optional(),
  version: z.string().optional()
});

export type McpEndpoint = z.infer<typeof McpEndpointSchema>;
export type RegistryMcpTool = z.infer<typeof RegistryMcpToolSchema>;
export type McpToolMeta = z.infer<typeof McpToolMetaSchema>;
export type McpToolSpec = z.infer<typeof McpToolSpecSchema>;
export type McpServerDetail = z.infer<typeof McpServerDetailSchema>;
export type AgentInterface = z.infer<typeof AgentInterfaceSchema>;
export type AgentSkill = z.infer<typeof AgentSkillSchema>;
export type RegistryAgentCard = z.infer<typeof RegistryAgentCardSchema>;
export type AgentEndpoint = z.infer<typeof AgentEndpointSchema>;

/**
 * MCP protocols the bridge can connect to
 */
export const McpProtocol = {
  SSE: 'mcp-sse',
  STREAMABLE: 'mcp-streamable'
} as const;

export type McpProtocolType = (typeof McpProtocol)[keyof typeof McpProtocol];
