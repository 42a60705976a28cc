/**
 * Mutex built on closures
 * The lock is released even when the guarded function throws.
 */
export type Mutex = {
  acquire(): Promise<() => void>;
  runExclusive<T>(fn: () => Promise<T> | T): Promise<T>;
  isLocked(): boolean;
};

export function createMutex(): Mutex {
  const queue: Array<() => void> = [];
  let locked = false;

  const release = (): void => {
    const next = queue.shift();
    if (next) {
      // Ownership passes straight to the next waiter
      next();
    } else {
      locked = false;
    }
  };

  const acquire = async (): Promise<() => void> => {
    return new Promise<() => void>((resolve) => {
      let released = false;
      const grant = () => {
        locked = true;
        resolve(() => {
          if (released) return;
          released = true;
          release();
        });
      };

      if (!locked) {
        grant();
      } else {
        queue.push(grant);
      }
    });
  };

  const runExclusive = async <T>(fn: () => Promise<T> | T): Promise<T> => {
    const releaseLock = await acquire();
    try {
      return await fn();
    } finally {
      releaseLock();
    }
  };

  return { acquire, runExclusive, isLocked: () => locked };
}
