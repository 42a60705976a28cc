import { createSilentLogger, type Logger, toErrorMessage } from '@registry-bridge/core';

export type PushChannelOptions<E> = {
  handler: (event: E) => Promise<void> | void;
  logger?: Logger;
};

/**
 * Serial in-process queue between registry callbacks and dependent refresh
 *
 * `publish` only enqueues, so a slow handler never holds up the registry
 * callback that produced the event. Events are handled one at a time in
 * publish order.
 */
export class PushChannel<E extends object> {
  private readonly queue: E[] = [];
  private readonly handler: (event: E) => Promise<void> | void;
  private readonly logger: Logger;
  private loop: Promise<void> | undefined;
  private closed = false;

  constructor(options: PushChannelOptions<E>) {
    this.handler = options.handler;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * @returns false when the channel is closed and the event was dropped
   */
  publish(event: E): boolean {
    if (this.closed) {
      this.logger.debug('Dropping event published after close');
      return false;
    }
    this.queue.push(event);
    if (!this.loop) {
      this.loop = this.run();
    }
    return true;
  }

  get pending(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Resolves once every queued event has been handled
   */
  async drain(): Promise<void> {
    while (this.loop) {
      await this.loop;
    }
  }

  /**
   * Drop queued events, wait for the one in flight and refuse later ones
   */
  async close(): Promise<void> {
    this.closed = true;
    this.queue.length = 0;
    await this.drain();
  }

  private async run(): Promise<void> {
    // Handlers never start inside publish()
    await Promise.resolve();
    let event = this.queue.shift();
    while (event !== undefined) {
      await this.dispatch(event);
      event = this.queue.shift();
    }
    this.loop = undefined;
  }

  private async dispatch(event: E): Promise<void> {
    try {
      await this.handler(event);
    } catch (error) {
      this.logger.error('Push event handler failed', { error: toErrorMessage(error) });
    }
  }
}
