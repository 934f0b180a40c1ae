import seedrandom from 'seedrandom';
import { Rng } from '../types';

/**
 * Random source for the loop and the action policy.
 * A seed gives a reproducible sequence; without one, Math.random is used.
 */
export function createRng(seed?: number | string): Rng {
  if (seed === undefined) {
    return Math.random;
  }
  const prng = seedrandom(String(seed));
  return () => prng();
}

/**
 * Uniform pick from a non-empty list
 */
export function pickOne<T>(items: readonly T[], rng: Rng): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  const index = Math.min(Math.floor(rng() * items.length), items.length - 1);
  return items[index];
}
