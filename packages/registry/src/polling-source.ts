import {
  createSilentLogger,
  type Logger,
  stableStringify,
  toErrorMessage
} from '@registry-bridge/core';
import type { DescriptorListener, DescriptorSource } from './types.js';

export type PollingSourceOptions<D> = {
  fetch: (name: string) => Promise<D>;
  intervalMs: number;
  logger?: Logger;
};

type Watch<D> = {
  listeners: Set<DescriptorListener<D>>;
  fingerprint?: string;
  timer?: ReturnType<typeof setTimeout>;
};

/**
 * Descriptor source that turns periodic fetches into push events
 *
 * One poller runs per watched name. Listeners hear about a descriptor only
 * when its content changed since the last fetch.
 */
export class PollingSource<D> implements DescriptorSource<D> {
  private readonly watches = new Map<string, Watch<D>>();
  private readonly fetchDescriptor: (name: string) => Promise<D>;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private closed = false;

  constructor(options: PollingSourceOptions<D>) {
    this.fetchDescriptor = options.fetch;
    this.intervalMs = options.intervalMs;
    this.logger = options.logger ?? createSilentLogger();
  }

  async subscribe(name: string, listener: DescriptorListener<D>): Promise<D> {
    const watch = this.watchFor(name);
    watch.listeners.add(listener);

    let descriptor: D;
    try {
      descriptor = await this.fetchDescriptor(name);
    } catch (error) {
      await this.unsubscribe(name, listener);
      throw error;
    }

    // Only the first subscriber's fetch sets the baseline
    if (watch.fingerprint === undefined) {
      watch.fingerprint = stableStringify(descriptor);
    }
    this.schedule(name, watch);
    return descriptor;
  }

  async unsubscribe(name: string, listener: DescriptorListener<D>): Promise<void> {
    const watch = this.watches.get(name);
    if (!watch) return;
    watch.listeners.delete(listener);
    if (watch.listeners.size === 0) {
      if (watch.timer) clearTimeout(watch.timer);
      this.watches.delete(name);
    }
  }

  watching(): string[] {
    return [...this.watches.keys()];
  }

  close(): void {
    this.closed = true;
    for (const watch of this.watches.values()) {
      if (watch.timer) clearTimeout(watch.timer);
    }
    this.watches.clear();
  }

  /**
   * Fetch once and notify listeners if the descriptor changed
   */
  async poll(name: string): Promise<void> {
    const watch = this.watches.get(name);
    if (!watch) return;

    let descriptor: D;
    try {
      descriptor = await this.fetchDescriptor(name);
    } catch (error) {
      this.logger.warn(`Polling ${name} failed, keeping last known descriptor`, {
        error: toErrorMessage(error)
      });
      return;
    }

    // Unsubscribed while the fetch was running
    if (this.watches.get(name) !== watch) return;

    const fingerprint = stableStringify(descriptor);
    if (fingerprint === watch.fingerprint) return;
    watch.fingerprint = fingerprint;

    this.logger.debug(`Change detected for ${name}`);
    for (const listener of [...watch.listeners]) {
      try {
        listener(name, descriptor);
      } catch (error) {
        this.logger.error(`Listener for ${name} failed`, { error: toErrorMessage(error) });
      }
    }
  }

  private watchFor(name: string): Watch<D> {
    let watch = this.watches.get(name);
    if (!watch) {
      watch = { listeners: new Set() };
      this.watches.set(name, watch);
    }
    return watch;
  }

  private schedule(name: string, watch: Watch<D>): void {
    if (this.closed || watch.timer || this.watches.get(name) !== watch) return;
    const timer = setTimeout(() => {
      void this.poll(name).finally(() => {
        watch.timer = undefined;
        this.schedule(name, watch);
      });
    }, this.intervalMs);
    timer.unref();
    watch.timer = timer;
  }
}
