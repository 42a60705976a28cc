import { ClosedError, createSilentLogger, type Logger, toErrorMessage } from '@registry-bridge/core';

export type Closable = {
  close(): Promise<void>;
};

/**
 * Reference-counted wrapper around a session
 *
 * After `retire()` no new call may start; the session is closed once the
 * calls already running have settled.
 */
export class SessionHandle<S extends Closable> {
  readonly session: S;
  private readonly logger: Logger;
  private inFlight = 0;
  private drained: (() => void) | undefined;
  private retiring: Promise<void> | undefined;

  constructor(session: S, logger?: Logger) {
    this.session = session;
    this.logger = logger ?? createSilentLogger();
  }

  get activeCalls(): number {
    return this.inFlight;
  }

  get isRetired(): boolean {
    return this.retiring !== undefined;
  }

  async use<T>(fn: (session: S) => Promise<T>): Promise<T> {
    if (this.retiring) {
      throw new ClosedError('Session has been retired');
    }
    this.inFlight += 1;
    try {
      return await fn(this.session);
    } finally {
      this.inFlight -= 1;
      if (this.inFlight === 0) this.drained?.();
    }
  }

  /**
   * Stop accepting calls and close after in-flight calls finish
   */
  retire(): Promise<void> {
    if (!this.retiring) {
      const idle = new Promise<void>((resolve) => {
        this.drained = resolve;
      });
      if (this.inFlight === 0) this.drained?.();
      this.retiring = idle.then(() => this.closeSession());
    }
    return this.retiring;
  }

  private async closeSession(): Promise<void> {
    try {
      await this.session.close();
    } catch (error) {
      this.logger.warn('Failed to close retired session', { error: toErrorMessage(error) });
    }
  }
}
