export type WaitForOptions = {
  timeout?: number;
  interval?: number;
  errorMessage?: string;
};

/**
 * Poll until the predicate returns a truthy value
 */
export async function waitFor<T>(
  predicate: () => T | Promise<T>,
  options: WaitForOptions = {}
): Promise<T> {
  const { timeout = 2000, interval = 10, errorMessage = 'Timeout waiting for condition' } = options;
  const deadline = Date.now() + timeout;
  let lastError: unknown;

  while (Date.now() < deadline) {
    try {
      const result = await predicate();
      if (result) return result;
    } catch (error) {
      lastError = error;
    }
    await delay(interval);
  }

  throw new Error(`${errorMessage} (timeout: ${timeout}ms)`, { cause: lastError });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Resolve a promise that can be settled from outside
 */
export function deferred<T = void>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
} {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
