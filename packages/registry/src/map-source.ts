import { createSilentLogger, type Logger, toErrorMessage } from '@registry-bridge/core';
import type { DescriptorListener, DescriptorSource } from './types.js';

/**
 * View a descriptor source through a conversion
 *
 * A pushed descriptor that fails to convert is logged and not delivered; the
 * listener keeps the previous value.
 */
export function mapSource<S, D>(
  source: DescriptorSource<S>,
  convert: (descriptor: S) => D,
  logger: Logger = createSilentLogger()
): DescriptorSource<D> {
  const wrapped = new Map<DescriptorListener<D>, DescriptorListener<S>>();

  return {
    async subscribe(name, listener) {
      let inner = wrapped.get(listener);
      if (!inner) {
        inner = (pushedName, descriptor) => {
          let converted: D;
          try {
            converted = convert(descriptor);
          } catch (error) {
            logger.error(`Dropping update for ${pushedName}: conversion failed`, {
              error: toErrorMessage(error)
            });
            return;
          }
          listener(pushedName, converted);
        };
        wrapped.set(listener, inner);
      }
      return convert(await source.subscribe(name, inner));
    },

    async unsubscribe(name, listener) {
      const inner = wrapped.get(listener);
      if (!inner) return;
      wrapped.delete(listener);
      await source.unsubscribe(name, inner);
    }
  };
}
