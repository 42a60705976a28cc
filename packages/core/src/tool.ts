import type { ContentBlock } from './message.js';

export type ToolResult = {
  content: ContentBlock[];
  isError?: boolean;
};

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
};

/**
 * Callable tool as seen by an agent
 *
 * Implementations may change `description` and `parameters` over time; callers
 * read them on each use.
 */
export type AgentTool = {
  readonly name: string;
  readonly description: string;
  readonly parameters: Record<string, unknown>;
  call(input: Record<string, unknown>): Promise<ToolResult>;
};

/**
 * Minimal view of an MCP client the toolkit can register
 */
export type McpToolInfo = {
  name: string;
  description?: string;
  inputSchema: Record<string, unknown>;
};

export type McpCallResult = {
  content: ReadonlyArray<{ type: string; [key: string]: unknown }>;
  isError?: boolean;
};

export type McpClientLike = {
  readonly name: string;
  listTools(): Promise<McpToolInfo[]>;
  callTool(name: string, args: Record<string, unknown>): Promise<McpCallResult>;
};

export const EMPTY_PARAMETERS: Record<string, unknown> = { type: 'object', properties: {} };

export function toToolDefinition(tool: AgentTool): ToolDefinition {
  return { name: tool.name, description: tool.description, parameters: tool.parameters };
}

/**
 * Map MCP call content to tool result blocks
 *
 * Text items become text blocks; anything else is kept as a data block.
 */
export function toToolResult(result: McpCallResult): ToolResult {
  const content = result.content.map((item): ContentBlock => {
    if (item.type === 'text' && 'text' in item && typeof item.text === 'string') {
      return { type: 'text', text: item.text };
    }
    return { type: 'data', data: { ...item } };
  });
  return result.isError ? { content, isError: true } : { content };
}

export function errorResult(message: string): ToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}
