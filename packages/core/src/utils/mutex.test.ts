import { describe, expect, it } from 'vitest';
import { createMutex } from './mutex.js';

const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe('createMutex', () => {
  it('should run guarded functions one at a time in arrival order', async () => {
    const mutex = createMutex();
    const order: string[] = [];
    let releaseFirst: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = mutex.runExclusive(async () => {
      order.push('first:start');
      await gate;
      order.push('first:end');
    });
    const second = mutex.runExclusive(() => {
      order.push('second');
    });

    await flush();
    expect(order).toEqual(['first:start']);
    expect(mutex.isLocked()).toBe(true);

    releaseFirst();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked()).toBe(false);
  });

  it('should release the lock when the function throws', async () => {
    const mutex = createMutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive(() => 'ok')).resolves.toBe('ok');
  });

  it('should ignore a second release of the same lock', async () => {
    const mutex = createMutex();
    const release = await mutex.acquire();
    const waiting = mutex.acquire();

    release();
    release();
    const releaseSecond = await waiting;

    expect(mutex.isLocked()).toBe(true);
    releaseSecond();
    expect(mutex.isLocked()).toBe(false);
  });
});
