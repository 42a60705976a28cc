import { InMemoryRegistryClient } from '@registry-bridge/test-utils';
import { describe, expect, it, vi } from 'vitest';
import { RegistryClientPool } from './client-pool.js';
import { NacosRegistryClient } from './nacos-client.js';
import type { RegistryClient } from './types.js';

describe('RegistryClientPool', () => {
  it('should share one client per connection', () => {
    const factory = vi.fn(() => new InMemoryRegistryClient());
    const pool = new RegistryClientPool({ factory });

    const first = pool.get({ serverAddr: 'http://nacos-a:8848', namespaceId: 'agents' });
    const second = pool.get({ namespaceId: 'agents', serverAddr: 'http://nacos-a:8848' });
    const other = pool.get({ serverAddr: 'http://nacos-b:8848' });

    expect(second).toBe(first);
    expect(other).not.toBe(first);
    expect(factory).toHaveBeenCalledTimes(2);
    expect(pool.size).toBe(2);
  });

  it('should treat explicit defaults as the same connection', () => {
    const pool = new RegistryClientPool({ factory: () => new InMemoryRegistryClient() });

    expect(pool.get()).toBe(pool.get({ serverAddr: 'http://127.0.0.1:8848', namespaceId: 'public' }));
  });

  it('should build registry HTTP clients by default', async () => {
    const pool = new RegistryClientPool();

    expect(pool.get()).toBeInstanceOf(NacosRegistryClient);
    await pool.closeAll();
  });

  it('should reject invalid connections', () => {
    const pool = new RegistryClientPool({ factory: () => new InMemoryRegistryClient() });

    expect(() => pool.get({ serverAddr: 'not a url' })).toThrow('Configuration validation failed');
    expect(pool.size).toBe(0);
  });

  it('should close every client and report failures together', async () => {
    const healthy = new InMemoryRegistryClient();
    const broken: RegistryClient = Object.assign(new InMemoryRegistryClient(), {
      close: async () => Promise.reject(new Error('socket stuck'))
    });
    const clients = [healthy, broken];
    const pool = new RegistryClientPool({
      factory: () => clients.shift() ?? new InMemoryRegistryClient()
    });
    pool.get({ serverAddr: 'http://nacos-a:8848' });
    pool.get({ serverAddr: 'http://nacos-b:8848' });

    const error = await pool.closeAll().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AggregateError);
    expect(error).toMatchObject({ message: 'Failed to close registry clients' });
    expect(healthy.closed).toBe(true);
    expect(pool.size).toBe(0);
  });
});
