import { createSilentLogger, type Logger, toErrorMessage } from '@registry-bridge/core';
import type { Dependent } from './types.js';

export type RefreshFailure<T> = {
  dependent: T;
  error: unknown;
};

/**
 * Resource name → dependents that follow it
 *
 * Membership is by object identity. Notification works on a snapshot, so
 * dependents may add or remove themselves while a refresh is running.
 */
export class DependentRegistry<D, T extends Dependent<D> = Dependent<D>> {
  private readonly dependents = new Map<string, Set<T>>();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * @returns false when the dependent was already registered
   */
  add(name: string, dependent: T): boolean {
    let set = this.dependents.get(name);
    if (!set) {
      set = new Set();
      this.dependents.set(name, set);
    }
    if (set.has(dependent)) return false;
    set.add(dependent);
    return true;
  }

  remove(name: string, dependent: T): boolean {
    const set = this.dependents.get(name);
    if (!set) return false;
    const removed = set.delete(dependent);
    if (set.size === 0) this.dependents.delete(name);
    return removed;
  }

  has(name: string, dependent: T): boolean {
    return this.dependents.get(name)?.has(dependent) ?? false;
  }

  size(name: string): number {
    return this.dependents.get(name)?.size ?? 0;
  }

  snapshot(name: string): T[] {
    return [...(this.dependents.get(name) ?? [])];
  }

  /**
   * Refresh every dependent of `name` in turn with the same descriptor
   * @returns the dependents whose refresh failed
   */
  async notify(name: string, descriptor: D): Promise<RefreshFailure<T>[]> {
    const failures: RefreshFailure<T>[] = [];
    const targets = this.snapshot(name);
    this.logger.debug(`Refreshing ${targets.length} dependents of ${name}`);

    for (const dependent of targets) {
      // Skip dependents removed while earlier ones were refreshing
      if (!this.has(name, dependent)) continue;
      try {
        await dependent.refresh(descriptor);
      } catch (error) {
        this.logger.warn(`Dependent refresh failed for ${name}`, { error: toErrorMessage(error) });
        failures.push({ dependent, error });
      }
    }
    return failures;
  }

  clear(): void {
    this.dependents.clear();
  }
}
