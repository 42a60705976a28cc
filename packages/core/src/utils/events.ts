import type { Logger } from '../logger.js';

export type EventHandler<D> = (data: D) => void;

export type EventEmitter<M extends object> = {
  on: <E extends keyof M>(event: E, handler: EventHandler<M[E]>) => void;
  off: <E extends keyof M>(event: E, handler: EventHandler<M[E]>) => void;
  emit: <E extends keyof M>(event: E, data: M[E]) => void;
  clear: () => void;
};

type HandlerTable<M extends object> = {
  [E in keyof M]?: Set<EventHandler<M[E]>>;
};

/**
 * Create an event emitter typed by an event map
 *
 * Handler errors are logged and do not reach the emitter.
 */
export function createEventEmitter<M extends object>(logger?: Logger): EventEmitter<M> {
  let handlers: HandlerTable<M> = {};

  function on<E extends keyof M>(event: E, handler: EventHandler<M[E]>): void {
    const set = handlers[event] ?? new Set<EventHandler<M[E]>>();
    set.add(handler);
    handlers[event] = set;
  }

  function off<E extends keyof M>(event: E, handler: EventHandler<M[E]>): void {
    handlers[event]?.delete(handler);
  }

  function emit<E extends keyof M>(event: E, data: M[E]): void {
    const set = handlers[event];
    if (!set) return;
    for (const h of [...set]) {
      try {
        h(data);
      } catch (error) {
        logger?.error(`Error in event handler for ${String(event)}`, {
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }
  }

  function clear(): void {
    handlers = {};
  }

  return { on, off, emit, clear };
}
