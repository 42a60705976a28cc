import {
  createSilentLogger,
  type Logger,
  type RegistryConnection,
  type RegistryConnectionInput,
  resolveRegistryConnection,
  stableStringify,
  toErrorMessage
} from '@registry-bridge/core';
import { NacosRegistryClient } from './nacos-client.js';
import type { RegistryClient } from './types.js';

export type RegistryClientFactory = (connection: RegistryConnection) => RegistryClient;

/**
 * One registry client per distinct connection config
 *
 * The application owns the pool and closes it on shutdown.
 */
export class RegistryClientPool {
  private readonly clients = new Map<string, RegistryClient>();
  private readonly factory: RegistryClientFactory;
  private readonly logger: Logger;

  constructor(options: { factory?: RegistryClientFactory; logger?: Logger } = {}) {
    this.logger = options.logger ?? createSilentLogger();
    this.factory =
      options.factory ??
      ((connection) => new NacosRegistryClient({ connection, logger: this.logger }));
  }

  get(config: RegistryConnectionInput = {}): RegistryClient {
    const connection = resolveRegistryConnection(config);
    const key = stableStringify(connection);
    let client = this.clients.get(key);
    if (!client) {
      client = this.factory(connection);
      this.clients.set(key, client);
      this.logger.debug(`Created registry client for ${connection.serverAddr}`, {
        namespaceId: connection.namespaceId
      });
    }
    return client;
  }

  get size(): number {
    return this.clients.size;
  }

  /**
   * Close every client; failures are collected and rethrown together
   */
  async closeAll(): Promise<void> {
    const clients = [...this.clients.values()];
    this.clients.clear();
    const results = await Promise.allSettled(clients.map((client) => client.close()));
    const errors = results.flatMap((result) =>
      result.status === 'rejected' ? [result.reason] : []
    );
    if (errors.length > 0) {
      this.logger.error(`Failed to close ${errors.length} registry client(s)`, {
        errors: errors.map(toErrorMessage)
      });
      throw new AggregateError(errors, 'Failed to close registry clients');
    }
  }
}
