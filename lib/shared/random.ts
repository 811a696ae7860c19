/**
 * Random number sources.
 *
 * Every randomized operation in the library draws from a {@link RandomSource},
 * so callers that need reproducible results can pass a seeded one.
 *
 * @module
 */
import { hrtime } from "node:process";
import rsexport from "random-seed";
const { create } = rsexport;

/**
 * Simple interface for random number generation.
 * `random-seed` generators satisfy it directly.
 */
export interface RandomSource {
  /** Returns a random integer between min (inclusive) and max (inclusive) */
  intBetween(min: number, max: number): number;
}

let shared: RandomSource | undefined;

/**
 * @param seed the seed; the same seed always yields the same sequence.
 * @returns a new seeded random source.
 */
export function createRandomSource(seed: string): RandomSource {
  return create(seed);
}

/**
 * The process-wide source used when no source is supplied, created on first
 * use and seeded from the high resolution clock.
 */
export function sharedRandomSource(): RandomSource {
  if (shared === undefined) {
    shared = create(hrtime.bigint().toString());
  }
  return shared;
}

/**
 * Fisher-Yates shuffle of `values` in place.
 */
export function shuffleInPlace<T>(values: T[], rs: RandomSource): T[] {
  for (let i = values.length - 1; i > 0; i--) {
    const j = rs.intBetween(0, i);
    const tmp = values[i];
    values[i] = values[j];
    values[j] = tmp;
  }
  return values;
}
