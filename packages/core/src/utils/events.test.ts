import { describe, expect, it, vi } from 'vitest';
import { createLogger } from '../logger.js';
import { createEventEmitter } from './events.js';

type Events = {
  updated: { name: string };
  failed: Error;
};

describe('createEventEmitter', () => {
  it('should deliver events to every handler', () => {
    const emitter = createEventEmitter<Events>();
    const first = vi.fn();
    const second = vi.fn();
    emitter.on('updated', first);
    emitter.on('updated', second);

    emitter.emit('updated', { name: 'weather' });

    expect(first).toHaveBeenCalledWith({ name: 'weather' });
    expect(second).toHaveBeenCalledWith({ name: 'weather' });
  });

  it('should stop delivering after off', () => {
    const emitter = createEventEmitter<Events>();
    const handler = vi.fn();
    emitter.on('failed', handler);
    emitter.off('failed', handler);

    emitter.emit('failed', new Error('x'));

    expect(handler).not.toHaveBeenCalled();
  });

  it('should log handler errors and keep delivering', () => {
    const lines: string[] = [];
    const logger = createLogger({
      level: 'error',
      output: (line) => lines.push(line),
      now: () => new Date('2026-01-01T00:00:00.000Z')
    });
    const emitter = createEventEmitter<Events>(logger);
    const after = vi.fn();
    emitter.on('updated', () => {
      throw new Error('handler broke');
    });
    emitter.on('updated', after);

    emitter.emit('updated', { name: 'weather' });

    expect(after).toHaveBeenCalledTimes(1);
    expect(lines).toEqual([
      '[2026-01-01T00:00:00.000Z] [ERROR] Error in event handler for updated {"error":"handler broke"}'
    ]);
  });

  it('should drop every handler on clear', () => {
    const emitter = createEventEmitter<Events>();
    const handler = vi.fn();
    emitter.on('updated', handler);
    emitter.clear();

    emitter.emit('updated', { name: 'weather' });

    expect(handler).not.toHaveBeenCalled();
  });
});
