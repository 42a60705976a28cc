import { ClosedError } from '@registry-bridge/core';
import { deferred } from '@registry-bridge/test-utils';
import { describe, expect, it, vi } from 'vitest';
import { SessionHandle } from './session-handle.js';

const makeSession = () => ({
  close: vi.fn<() => Promise<void>>(async () => {})
});

describe('SessionHandle', () => {
  it('should close immediately when idle', async () => {
    const session = makeSession();
    const handle = new SessionHandle(session);

    await handle.retire();

    expect(session.close).toHaveBeenCalledTimes(1);
    expect(handle.isRetired).toBe(true);
  });

  it('should wait for in-flight calls before closing', async () => {
    const session = makeSession();
    const handle = new SessionHandle(session);
    const call = deferred<string>();

    const running = handle.use(() => call.promise);
    expect(handle.activeCalls).toBe(1);

    const retired = handle.retire();
    await Promise.resolve();
    expect(session.close).not.toHaveBeenCalled();

    call.resolve('done');
    await expect(running).resolves.toBe('done');
    await retired;
    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it('should close after a failing in-flight call', async () => {
    const session = makeSession();
    const handle = new SessionHandle(session);

    const running = handle.use(async () => Promise.reject(new Error('call failed')));
    const retired = handle.retire();

    await expect(running).rejects.toThrow('call failed');
    await retired;
    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it('should refuse new calls once retired', async () => {
    const handle = new SessionHandle(makeSession());
    const retired = handle.retire();

    await expect(handle.use(async () => 'late')).rejects.toBeInstanceOf(ClosedError);
    await retired;
  });

  it('should return the same promise on repeated retire', async () => {
    const session = makeSession();
    const handle = new SessionHandle(session);

    const first = handle.retire();
    expect(handle.retire()).toBe(first);
    await first;
    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it('should not reject when close fails', async () => {
    const handle = new SessionHandle({ close: async () => Promise.reject(new Error('stuck')) });

    await expect(handle.retire()).resolves.toBeUndefined();
  });
});
