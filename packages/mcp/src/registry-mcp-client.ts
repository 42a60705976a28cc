/**
 * MCP client bound to a server discovered in the registry
 *
 * The client follows the registry: when the server's detail changes it
 * connects to the new endpoint, swaps sessions, and tells its refresh hooks.
 */

import {
  ClosedError,
  createMutex,
  createSilentLogger,
  InvalidParamError,
  type Logger,
  type McpCallResult,
  type McpClientLike,
  type McpServerDetail,
  type McpToolInfo,
  RefreshError,
  toErrorMessage
} from '@registry-bridge/core';
import type { Dependent } from '@registry-bridge/registry';
import { type McpConnector, type McpSession, createSdkConnector } from './connector.js';
import { resolveMcpTarget } from './endpoint.js';
import type { McpServerManager } from './server-manager.js';
import { SessionHandle } from './session-handle.js';
import { overlayToolSpecs } from './tool-spec.js';

export type RefreshHook = (
  detail: McpServerDetail,
  client: RegistryMcpClient
) => void | Promise<void>;

export type RegistryMcpClientOptions = {
  connector?: McpConnector;
  logger?: Logger;
};

export class RegistryMcpClient implements McpClientLike, Dependent<McpServerDetail> {
  readonly name: string;
  private detail: McpServerDetail;
  private readonly manager: McpServerManager;
  private readonly connector: McpConnector;
  private readonly logger: Logger;
  private readonly hooks = new Set<RefreshHook>();
  private readonly mutex = createMutex();
  private readonly retiring = new Set<Promise<void>>();
  private handle: SessionHandle<McpSession> | undefined;
  private closed = false;

  constructor(
    name: string,
    detail: McpServerDetail,
    manager: McpServerManager,
    options: RegistryMcpClientOptions = {}
  ) {
    this.name = name;
    this.detail = detail;
    this.manager = manager;
    this.logger = (options.logger ?? createSilentLogger()).child(name);
    this.connector = options.connector ?? createSdkConnector({ logger: this.logger });
  }

  get isInitialized(): boolean {
    return this.handle !== undefined;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Connect and subscribe to registry updates; later calls do nothing
   */
  async initialize(): Promise<void> {
    if (this.handle) return;
    await this.mutex.runExclusive(async () => {
      this.assertOpen();
      if (this.handle) return;
      this.logger.info(`Initializing MCP client ${this.name}`);
      // Subscribed first: a push landing during connect is applied right after
      this.manager.registerSubscribeClient(this.name, this);
      try {
        this.detail = await this.manager.getMcpServer(this.name);
        this.handle = new SessionHandle(await this.connect(this.detail), this.logger);
      } catch (error) {
        this.manager.unregisterSubscribeClient(this.name, this);
        throw error;
      }
    });
  }

  /**
   * Tools listed by the server, described the way the registry describes them
   */
  async listTools(): Promise<McpToolInfo[]> {
    const tools = await this.withSession((session) => session.listTools());
    return overlayToolSpecs(tools, this.detail.toolSpec?.tools ?? [], this.logger);
  }

  callTool(name: string, args: Record<string, unknown> = {}): Promise<McpCallResult> {
    return this.withSession((session) => session.callTool(name, args));
  }

  getMcpServer(): McpServerDetail {
    return this.detail;
  }

  /**
   * Called after every refresh with the new detail
   * @returns a function removing the hook
   */
  registerRefreshHook(hook: RefreshHook): () => void {
    this.hooks.add(hook);
    return () => {
      this.hooks.delete(hook);
    };
  }

  /**
   * Switch to a new server detail
   *
   * The replacement session is connected before the swap, so a failed refresh
   * leaves the current session in place. The old session is closed once its
   * in-flight calls finish.
   */
  async refresh(detail: McpServerDetail): Promise<void> {
    await this.mutex.runExclusive(async () => {
      if (this.closed) return;
      this.logger.info(`Refreshing MCP client ${this.name}`);

      if (this.handle) {
        let session: McpSession;
        try {
          session = await this.connect(detail);
        } catch (error) {
          throw new RefreshError(
            this.name,
            `Failed to refresh MCP client ${this.name}: ${toErrorMessage(error)}`,
            { cause: error }
          );
        }
        const previous = this.handle;
        this.handle = new SessionHandle(session, this.logger);
        this.retire(previous);
      }

      this.detail = detail;
      await this.notifyHooks(detail);
    });
  }

  /**
   * Unsubscribe, drop hooks and close the session after in-flight calls
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.manager.unregisterSubscribeClient(this.name, this);
    this.hooks.clear();

    await this.mutex.runExclusive(() => {
      if (this.handle) this.retire(this.handle);
      this.handle = undefined;
    });
    await Promise.all(this.retiring);
    this.logger.info(`Closed MCP client ${this.name}`);
  }

  private connect(detail: McpServerDetail): Promise<McpSession> {
    const target = resolveMcpTarget(detail);
    this.logger.debug(`Connecting to ${target.url}`, { protocol: target.protocol });
    return this.connector(target);
  }

  private async withSession<T>(fn: (session: McpSession) => Promise<T>): Promise<T> {
    this.assertOpen();
    if (!this.handle) await this.initialize();
    const handle = this.handle;
    if (!handle) {
      throw new ClosedError(`MCP client ${this.name} is closed`);
    }
    return handle.use(fn);
  }

  private retire(handle: SessionHandle<McpSession>): void {
    const done = handle.retire().finally(() => this.retiring.delete(done));
    this.retiring.add(done);
  }

  private async notifyHooks(detail: McpServerDetail): Promise<void> {
    const failures: unknown[] = [];
    for (const hook of [...this.hooks]) {
      try {
        await hook(detail, this);
      } catch (error) {
        this.logger.error('Refresh hook failed', { error: toErrorMessage(error) });
        failures.push(error);
      }
    }
    if (failures.length > 0) {
      throw new RefreshError(
        this.name,
        `${failures.length} refresh hook(s) failed for MCP client ${this.name}: ${toErrorMessage(failures[0])}`,
        { cause: failures[0] }
      );
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ClosedError(`MCP client ${this.name} is closed`);
    }
  }
}

export type CreateRegistryMcpClientOptions = RegistryMcpClientOptions & {
  /** Connect on first use instead of now */
  delayInitialize?: boolean;
};

/**
 * Look up `name` in the registry and build a client for it
 */
export async function createRegistryMcpClient(
  name: string,
  manager: McpServerManager,
  options: CreateRegistryMcpClientOptions = {}
): Promise<RegistryMcpClient> {
  if (!name.trim()) {
    throw new InvalidParamError('MCP server name must not be blank');
  }
  const detail = await manager.getMcpServer(name);
  const client = new RegistryMcpClient(name, detail, manager, options);
  if (!options.delayInitialize) {
    await client.initialize();
  }
  return client;
}
