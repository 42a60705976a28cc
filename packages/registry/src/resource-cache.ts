/**
 * Lazily populated, push-updated cache of registry descriptors
 */

import {
  ClosedError,
  createEventEmitter,
  createSilentLogger,
  DEFAULT_FETCH_TIMEOUT_MS,
  type EventEmitter,
  InvalidParamError,
  type Logger,
  RefreshError,
  type ResourceKind,
  toErrorMessage,
  withTimeout
} from '@registry-bridge/core';
import { DependentRegistry } from './dependent-registry.js';
import { PushChannel } from './push-channel.js';
import type { Dependent, DescriptorListener, DescriptorSource } from './types.js';

export type ResourceCacheEvents<D> = {
  'descriptor:updated': { name: string; descriptor: D };
  'refresh:failed': { name: string; error: RefreshError };
};

export type ResourceCacheOptions<D> = {
  source: DescriptorSource<D>;
  kind: ResourceKind;
  fetchTimeoutMs?: number;
  logger?: Logger;
};

type PushEvent<D> = {
  name: string;
  descriptor: D;
};

export class ResourceCache<D, T extends Dependent<D> = Dependent<D>> {
  readonly kind: ResourceKind;
  private readonly source: DescriptorSource<D>;
  private readonly fetchTimeoutMs: number;
  private readonly logger: Logger;
  private readonly entries = new Map<string, D>();
  private readonly inflight = new Map<string, Promise<D>>();
  private readonly listeners = new Map<string, DescriptorListener<D>>();
  private readonly dependents: DependentRegistry<D, T>;
  private readonly channel: PushChannel<PushEvent<D>>;
  private readonly events: EventEmitter<ResourceCacheEvents<D>>;
  private closed = false;

  constructor(options: ResourceCacheOptions<D>) {
    this.kind = options.kind;
    this.source = options.source;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.logger = options.logger ?? createSilentLogger();
    this.events = createEventEmitter<ResourceCacheEvents<D>>(this.logger);
    this.dependents = new DependentRegistry<D, T>({ logger: this.logger });
    this.channel = new PushChannel<PushEvent<D>>({
      handler: (event) => this.propagate(event),
      logger: this.logger
    });
  }

  /**
   * Current descriptor of `name`, fetched from the registry on first use
   *
   * Concurrent first lookups share one fetch. A failed fetch caches nothing,
   * so the next call fetches again.
   */
  async get(name: string): Promise<D> {
    this.assertOpen();
    if (!name.trim()) {
      throw new InvalidParamError(`${this.kind} name must not be blank`);
    }

    const cached = this.entries.get(name);
    if (cached !== undefined) return cached;

    let pending = this.inflight.get(name);
    if (!pending) {
      pending = this.fetch(name).finally(() => this.inflight.delete(name));
      this.inflight.set(name, pending);
    }
    return pending;
  }

  peek(name: string): D | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Store a pushed descriptor and queue the refresh of its dependents
   */
  handlePush(name: string, descriptor: D): void {
    if (this.closed) {
      this.logger.debug(`Ignoring push for ${name} after close`);
      return;
    }
    this.entries.set(name, descriptor);
    this.logger.info(`${this.kind} ${name} updated from registry`);
    this.events.emit('descriptor:updated', { name, descriptor });
    this.channel.publish({ name, descriptor });
  }

  addDependent(name: string, dependent: T): boolean {
    this.assertOpen();
    return this.dependents.add(name, dependent);
  }

  removeDependent(name: string, dependent: T): boolean {
    return this.dependents.remove(name, dependent);
  }

  dependentCount(name: string): number {
    return this.dependents.size(name);
  }

  on<E extends keyof ResourceCacheEvents<D>>(
    event: E,
    handler: (data: ResourceCacheEvents<D>[E]) => void
  ): void {
    this.events.on(event, handler);
  }

  off<E extends keyof ResourceCacheEvents<D>>(
    event: E,
    handler: (data: ResourceCacheEvents<D>[E]) => void
  ): void {
    this.events.off(event, handler);
  }

  /**
   * Resolves once every queued push has reached its dependents
   */
  drain(): Promise<void> {
    return this.channel.drain();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Unsubscribe from the registry and drop all state
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const [name, listener] of listeners) {
      await this.unsubscribe(name, listener);
    }

    await this.channel.close();
    this.entries.clear();
    this.dependents.clear();
    this.events.clear();
    this.logger.debug(`${this.kind} cache closed`);
  }

  private async fetch(name: string): Promise<D> {
    const listener = this.listenerFor(name);

    let descriptor: D;
    try {
      descriptor = await withTimeout(
        this.source.subscribe(name, listener),
        this.fetchTimeoutMs,
        `Timed out after ${this.fetchTimeoutMs}ms fetching ${this.kind} '${name}'`
      );
    } catch (error) {
      if (!this.entries.has(name) && this.listeners.get(name) === listener) {
        this.listeners.delete(name);
        await this.unsubscribe(name, listener);
      }
      throw error;
    }

    this.assertOpen();

    // A push that landed during the fetch is newer than the fetch result
    const existing = this.entries.get(name);
    if (existing !== undefined) return existing;

    this.entries.set(name, descriptor);
    this.logger.debug(`Cached ${this.kind} ${name}`);
    return descriptor;
  }

  private listenerFor(name: string): DescriptorListener<D> {
    let listener = this.listeners.get(name);
    if (!listener) {
      listener = (pushedName, descriptor) => this.handlePush(pushedName, descriptor);
      this.listeners.set(name, listener);
    }
    return listener;
  }

  private async unsubscribe(name: string, listener: DescriptorListener<D>): Promise<void> {
    try {
      await this.source.unsubscribe(name, listener);
    } catch (error) {
      this.logger.warn(`Failed to unsubscribe from ${this.kind} ${name}`, {
        error: toErrorMessage(error)
      });
    }
  }

  private async propagate({ name, descriptor }: PushEvent<D>): Promise<void> {
    const failures = await this.dependents.notify(name, descriptor);
    for (const { error } of failures) {
      const refreshError =
        error instanceof RefreshError
          ? error
          : new RefreshError(name, `Refresh of ${this.kind} ${name} failed: ${toErrorMessage(error)}`, {
              cause: error
            });
      this.logger.error(refreshError.message);
      this.events.emit('refresh:failed', { name, error: refreshError });
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ClosedError(`${this.kind} cache is closed`);
    }
  }
}
