import { ToolSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Logger, McpToolInfo, RegistryMcpTool } from '@registry-bridge/core';

/**
 * Overlay the registry's description and input schema on a listed tool
 *
 * The server's own spec is kept when the registry has no entry for the tool
 * or its entry is not a valid MCP tool.
 */
export function overlayToolSpec(
  tool: McpToolInfo,
  registered: RegistryMcpTool | undefined,
  logger?: Logger
): McpToolInfo {
  if (!registered) return tool;

  const candidate = ToolSchema.safeParse({
    name: tool.name,
    description: registered.description ?? tool.description,
    inputSchema: registered.inputSchema ?? tool.inputSchema
  });
  if (!candidate.success) {
    logger?.warn(`Registry spec of tool ${tool.name} is invalid, using the server's spec`, {
      issues: candidate.error.issues.map((issue) => issue.message)
    });
    return tool;
  }

  logger?.debug(`Applied registry spec to tool ${tool.name}`);
  return {
    name: tool.name,
    description: candidate.data.description,
    inputSchema: { ...candidate.data.inputSchema }
  };
}

export function overlayToolSpecs(
  tools: readonly McpToolInfo[],
  registered: readonly RegistryMcpTool[],
  logger?: Logger
): McpToolInfo[] {
  const byName = new Map(registered.map((tool) => [tool.name, tool]));
  return tools.map((tool) => overlayToolSpec(tool, byName.get(tool.name), logger));
}
