import { TimeoutError } from '../errors.js';

/**
 * Race a promise against a timer
 *
 * A non-positive or non-finite `timeoutMs` disables the bound. The timer is
 * cleared whichever side settles first.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  message = `Operation timed out after ${timeoutMs}ms`
): Promise<T> {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const race = Promise.race([
    promise,
    new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new TimeoutError(message, timeoutMs)), timeoutMs);
    })
  ]);
  try {
    return await race;
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
