/**
 * Registry-backed cache of MCP server details and their subscribed clients
 */

import {
  createSilentLogger,
  type Logger,
  type McpServerDetail,
  type RefreshError
} from '@registry-bridge/core';
import {
  type Dependent,
  type DescriptorSource,
  type RegistryClient,
  ResourceCache
} from '@registry-bridge/registry';

export type McpServerManagerOptions = {
  fetchTimeoutMs?: number;
  logger?: Logger;
};

export type RefreshFailedHandler = (event: { name: string; error: RefreshError }) => void;

export class McpServerManager {
  private readonly cache: ResourceCache<McpServerDetail>;
  private readonly logger: Logger;

  constructor(source: DescriptorSource<McpServerDetail>, options: McpServerManagerOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
    this.cache = new ResourceCache({
      source,
      kind: 'mcp-server',
      fetchTimeoutMs: options.fetchTimeoutMs,
      logger: this.logger
    });
  }

  static from(
    client: Pick<RegistryClient, 'mcpServers'>,
    options: McpServerManagerOptions = {}
  ): McpServerManager {
    return new McpServerManager(client.mcpServers, options);
  }

  /**
   * Server detail from the cache, subscribing to the registry on first use
   */
  getMcpServer(name: string): Promise<McpServerDetail> {
    return this.cache.get(name);
  }

  /**
   * Refresh `client` whenever the registry pushes a new detail for `name`
   */
  registerSubscribeClient(name: string, client: Dependent<McpServerDetail>): void {
    if (this.cache.addDependent(name, client)) {
      this.logger.debug(`Subscribed client to MCP server ${name}`);
    }
  }

  unregisterSubscribeClient(name: string, client: Dependent<McpServerDetail>): void {
    if (this.cache.removeDependent(name, client)) {
      this.logger.debug(`Unsubscribed client from MCP server ${name}`);
    }
  }

  subscriberCount(name: string): number {
    return this.cache.dependentCount(name);
  }

  onRefreshFailed(handler: RefreshFailedHandler): () => void {
    this.cache.on('refresh:failed', handler);
    return () => this.cache.off('refresh:failed', handler);
  }

  /**
   * Resolves once every pushed detail has reached its clients
   */
  drain(): Promise<void> {
    return this.cache.drain();
  }

  get isClosed(): boolean {
    return this.cache.isClosed;
  }

  close(): Promise<void> {
    return this.cache.close();
  }
}
