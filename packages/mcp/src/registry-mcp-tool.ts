import {
  type AgentTool,
  createSilentLogger,
  EMPTY_PARAMETERS,
  errorResult,
  filterToolNames,
  type Logger,
  type McpServerDetail,
  ResourceNotFoundError,
  type ToolDefinition,
  type ToolFilter,
  type ToolResult,
  toErrorMessage,
  toToolResult
} from '@registry-bridge/core';
import type { RegistryMcpClient } from './registry-mcp-client.js';

/**
 * Definition of tool `name` as published in a server detail
 */
export function deriveToolDefinition(name: string, detail: McpServerDetail): ToolDefinition {
  const tool = detail.toolSpec?.tools.find((candidate) => candidate.name === name);
  if (!tool) {
    throw new ResourceNotFoundError('tool', name, {
      message: `Tool ${name} not found in MCP server ${detail.name}`
    });
  }
  return {
    name,
    description: tool.description ?? '',
    parameters: tool.inputSchema ? { ...tool.inputSchema } : { ...EMPTY_PARAMETERS }
  };
}

/**
 * Agent tool backed by one tool of a registry MCP client
 *
 * Description and parameters are rebuilt from every new server detail.
 */
export class RegistryMcpTool implements AgentTool {
  readonly name: string;
  private readonly client: RegistryMcpClient;
  private readonly logger: Logger;
  private definition: ToolDefinition;
  private readonly detachHook: () => void;

  constructor(name: string, client: RegistryMcpClient, logger?: Logger) {
    this.name = name;
    this.client = client;
    this.logger = logger ?? createSilentLogger();
    this.definition = deriveToolDefinition(name, client.getMcpServer());
    this.detachHook = client.registerRefreshHook((detail) => {
      this.logger.debug(`Refreshing tool ${name} from MCP client ${client.name}`);
      if (!detail.toolSpec?.tools.some((candidate) => candidate.name === name)) {
        // Keeps the last definition; the registry no longer publishes this tool
        this.logger.warn(`Tool ${name} was removed from MCP server ${detail.name}, detaching it`);
        this.detach();
        return;
      }
      this.definition = deriveToolDefinition(name, detail);
    });
  }

  get description(): string {
    return this.definition.description;
  }

  get parameters(): Record<string, unknown> {
    return this.definition.parameters;
  }

  async call(input: Record<string, unknown>): Promise<ToolResult> {
    try {
      return toToolResult(await this.client.callTool(this.name, input));
    } catch (error) {
      this.logger.warn(`Tool ${this.name} failed`, { error: toErrorMessage(error) });
      return errorResult(`Error calling tool ${this.name}: ${toErrorMessage(error)}`);
    }
  }

  /**
   * Stop following refreshes of the client
   */
  detach(): void {
    this.detachHook();
  }
}

/**
 * Tools of the client's current server detail, filtered
 *
 * Tools the registry marks as disabled are skipped.
 */
export function buildRegistryMcpTools(
  client: RegistryMcpClient,
  filter: ToolFilter = {},
  logger?: Logger
): RegistryMcpTool[] {
  const spec = client.getMcpServer().toolSpec;
  const enabled = (spec?.tools ?? []).filter((tool) => spec?.toolsMeta?.[tool.name]?.enabled !== false);
  return filterToolNames(enabled, filter, logger).map(
    (tool) => new RegistryMcpTool(tool.name, client, logger)
  );
}
