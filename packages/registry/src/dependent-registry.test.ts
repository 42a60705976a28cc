import { describe, expect, it, vi } from 'vitest';
import { DependentRegistry } from './dependent-registry.js';
import type { Dependent } from './types.js';

type Descriptor = { version: number };

const makeDependent = () => ({
  refresh: vi.fn<(descriptor: Descriptor) => Promise<void>>(async () => {})
});

describe('DependentRegistry', () => {
  it('should track membership by identity', () => {
    const registry = new DependentRegistry<Descriptor>();
    const dependent = makeDependent();

    expect(registry.add('weather', dependent)).toBe(true);
    expect(registry.add('weather', dependent)).toBe(false);
    expect(registry.add('weather', makeDependent())).toBe(true);
    expect(registry.size('weather')).toBe(2);
    expect(registry.has('weather', dependent)).toBe(true);

    expect(registry.remove('weather', dependent)).toBe(true);
    expect(registry.remove('weather', dependent)).toBe(false);
    expect(registry.size('weather')).toBe(1);
  });

  it('should return an empty snapshot for unknown names', () => {
    expect(new DependentRegistry<Descriptor>().snapshot('missing')).toEqual([]);
  });

  it('should let a dependent remove itself during notify', async () => {
    const registry = new DependentRegistry<Descriptor>();
    const other = makeDependent();
    const selfRemoving: Dependent<Descriptor> = {
      refresh: async () => {
        registry.remove('weather', selfRemoving);
      }
    };
    registry.add('weather', selfRemoving);
    registry.add('weather', other);

    await registry.notify('weather', { version: 2 });

    expect(other.refresh).toHaveBeenCalledWith({ version: 2 });
    expect(registry.size('weather')).toBe(1);
  });

  it('should skip dependents removed by an earlier refresh', async () => {
    const registry = new DependentRegistry<Descriptor>();
    const later = makeDependent();
    registry.add('weather', {
      refresh: async () => {
        registry.remove('weather', later);
      }
    });
    registry.add('weather', later);

    await registry.notify('weather', { version: 2 });

    expect(later.refresh).not.toHaveBeenCalled();
  });

  it('should collect failures without stopping', async () => {
    const registry = new DependentRegistry<Descriptor>();
    const error = new Error('boom');
    const failing: Dependent<Descriptor> = { refresh: async () => Promise.reject(error) };
    const healthy = makeDependent();
    registry.add('weather', failing);
    registry.add('weather', healthy);

    const failures = await registry.notify('weather', { version: 3 });

    expect(failures).toEqual([{ dependent: failing, error }]);
    expect(healthy.refresh).toHaveBeenCalledTimes(1);
  });
});
