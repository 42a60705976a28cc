/**
 * Toolkit: the registration point for tools an agent may call
 */

import { ResourceNotFoundError } from './errors.js';
import { createSilentLogger, type Logger } from './logger.js';
import {
  type AgentTool,
  type McpClientLike,
  type McpToolInfo,
  type ToolDefinition,
  type ToolResult,
  toToolDefinition,
  toToolResult
} from './tool.js';

export type ToolFilter = {
  includeTools?: readonly string[];
  excludeTools?: readonly string[];
};

/**
 * Keep the names a filter selects
 *
 * When both lists are given the include list wins.
 */
export function filterToolNames<T extends { name: string }>(
  tools: readonly T[],
  filter: ToolFilter,
  logger?: Logger
): T[] {
  const { includeTools, excludeTools } = filter;
  if (includeTools && includeTools.length > 0) {
    if (excludeTools && excludeTools.length > 0) {
      logger?.warn('Both include and exclude lists given, using the include list', {
        includeTools: [...includeTools],
        excludeTools: [...excludeTools]
      });
    }
    const included = new Set(includeTools);
    return tools.filter((tool) => included.has(tool.name));
  }
  if (excludeTools && excludeTools.length > 0) {
    const excluded = new Set(excludeTools);
    return tools.filter((tool) => !excluded.has(tool.name));
  }
  return [...tools];
}

export type RegisterToolOptions = {
  groupName?: string;
  source?: string;
};

export type RegisterMcpClientOptions = {
  enableTools?: readonly string[];
  disableTools?: readonly string[];
  groupName?: string;
};

export type CatalogChangeHook = (toolNames: string[]) => void;

type ToolEntry = {
  tool: AgentTool;
  groupName?: string;
  source?: string;
};

export type ToolkitOptions = {
  logger?: Logger;
};

/**
 * Tool bound to one tool of a plain MCP client
 */
class McpClientTool implements AgentTool {
  readonly name: string;
  readonly description: string;
  readonly parameters: Record<string, unknown>;

  constructor(
    private readonly client: McpClientLike,
    info: McpToolInfo
  ) {
    this.name = info.name;
    this.description = info.description ?? '';
    this.parameters = info.inputSchema;
  }

  async call(input: Record<string, unknown>): Promise<ToolResult> {
    return toToolResult(await this.client.callTool(this.name, input));
  }
}

export class Toolkit {
  protected readonly logger: Logger;
  private readonly tools = new Map<string, ToolEntry>();
  private readonly catalogHooks = new Set<CatalogChangeHook>();

  constructor(options: ToolkitOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
  }

  registerTool(tool: AgentTool, options: RegisterToolOptions = {}): void {
    this.insert(tool, options);
    this.notifyCatalogChange();
  }

  removeTool(name: string): boolean {
    const removed = this.tools.delete(name);
    if (removed) this.notifyCatalogChange();
    return removed;
  }

  getTool(name: string): AgentTool | undefined {
    return this.tools.get(name)?.tool;
  }

  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  listTools(groupName?: string): AgentTool[] {
    return [...this.tools.values()]
      .filter((entry) => groupName === undefined || entry.groupName === groupName)
      .map((entry) => entry.tool);
  }

  getToolNames(): string[] {
    return [...this.tools.keys()].sort();
  }

  getToolDefinitions(groupName?: string): ToolDefinition[] {
    return this.listTools(groupName).map(toToolDefinition);
  }

  async callTool(name: string, input: Record<string, unknown> = {}): Promise<ToolResult> {
    const tool = this.getTool(name);
    if (!tool) {
      throw new ResourceNotFoundError('tool', name);
    }
    return tool.call(input);
  }

  /**
   * Register the tools an MCP client lists, filtered
   * @returns the registered tool names
   */
  async registerMcpClient(
    client: McpClientLike,
    options: RegisterMcpClientOptions = {}
  ): Promise<string[]> {
    const listed = await client.listTools();
    const selected = filterToolNames(
      listed,
      { includeTools: options.enableTools, excludeTools: options.disableTools },
      this.logger
    );
    const tools = selected.map((info) => new McpClientTool(client, info));
    this.replaceSourceTools(client.name, tools, options.groupName);
    return tools.map((tool) => tool.name);
  }

  /**
   * Remove every tool registered from the named MCP client
   * @returns the removed tool names
   */
  removeMcpClient(clientName: string): string[] {
    const removed = this.dropSource(clientName);
    if (removed.length > 0) this.notifyCatalogChange();
    return removed;
  }

  onCatalogChange(hook: CatalogChangeHook): () => void {
    this.catalogHooks.add(hook);
    return () => {
      this.catalogHooks.delete(hook);
    };
  }

  /**
   * Swap all tools of one source for a new set, notifying once
   */
  protected replaceSourceTools(
    source: string,
    tools: readonly AgentTool[],
    groupName?: string
  ): void {
    this.dropSource(source);
    for (const tool of tools) {
      this.insert(tool, { groupName, source });
    }
    this.logger.debug(`Registered ${tools.length} tools from ${source}`, {
      tools: tools.map((tool) => tool.name)
    });
    this.notifyCatalogChange();
  }

  private dropSource(source: string): string[] {
    const removed: string[] = [];
    for (const [name, entry] of this.tools) {
      if (entry.source === source) {
        this.tools.delete(name);
        removed.push(name);
      }
    }
    return removed;
  }

  private insert(tool: AgentTool, options: RegisterToolOptions): void {
    const existing = this.tools.get(tool.name);
    if (existing && existing.tool !== tool) {
      this.logger.warn(`Tool ${tool.name} is already registered, overwriting`, {
        previousSource: existing.source,
        source: options.source
      });
    }
    this.tools.set(tool.name, { tool, groupName: options.groupName, source: options.source });
  }

  private notifyCatalogChange(): void {
    const names = this.getToolNames();
    for (const hook of [...this.catalogHooks]) {
      try {
        hook(names);
      } catch (error) {
        this.logger.error('Catalog change hook failed', {
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }
  }
}
