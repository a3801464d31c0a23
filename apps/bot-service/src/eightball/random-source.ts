import { RandomSource } from '@app/shared/types/eightball.types';

export const RANDOM_SOURCE = Symbol('RANDOM_SOURCE');

/**
 * Backed by `Math.random`, which the runtime seeds once per process.
 * Draws happen on the event loop thread, so concurrent requests never
 * interleave inside a draw.
 */
export class MathRandomSource implements RandomSource {
  nextInt(bound: number): number {
    if (!Number.isInteger(bound) || bound <= 0) {
      throw new RangeError(`bound must be a positive integer, got ${bound}`);
    }
    return Math.floor(Math.random() * bound);
  }
}
