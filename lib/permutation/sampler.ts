/**
 * Random sampling of equivalence classes.
 *
 * Draws distinct canonical representatives, and for each of them distinct
 * other members of its class, so that a caller can compare how equivalent
 * placements behave against each other.
 *
 * @module
 */
import { InvalidArgumentError } from "../shared/invalidArgumentError.ts";
import { type RandomSource, sharedRandomSource } from "../shared/random.ts";
import { Permutation } from "./permutation.ts";
import type { TreePermutation } from "./treePermutation.ts";

export interface SamplerOptions {
  /** Distinct canonical representatives to draw. */
  canonicalCount: number;
  /** Distinct non-canonical members to draw per representative. */
  symmetricCount: number;
  /**
   * Consecutive duplicate draws after which a search gives up, which bounds
   * the call when fewer classes or members exist than requested.
   */
  maxAttempts: number;
  verbose: boolean;
  random?: RandomSource;
}

export const DEFAULT_SAMPLER_OPTIONS = {
  canonicalCount: 100,
  symmetricCount: 100,
  maxAttempts: 1000,
  verbose: false,
} as const satisfies SamplerOptions;

export interface SampledPermutation {
  readonly permutation: Permutation;
  /** Canonical representative of `permutation`'s class. */
  readonly canonical: Permutation;
  /**
   * `symmetricCount` for a representative, 1 for the other members.
   */
  readonly weight: number;
}

/**
 * Sample equivalence classes of `source`'s tree. Every distinct permutation
 * appears once; `source` itself is left untouched.
 */
export function sampleEquivalenceClasses(
  source: TreePermutation,
  options: Partial<SamplerOptions> = {},
): SampledPermutation[] {
  const { canonicalCount, symmetricCount, maxAttempts, verbose } = {
    ...DEFAULT_SAMPLER_OPTIONS,
    ...options,
  };
  for (const [name, value] of Object.entries({ canonicalCount, symmetricCount })) {
    if (!Number.isInteger(value) || value < 0) {
      throw new InvalidArgumentError(`${name} must be a non-negative integer`);
    }
  }
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new InvalidArgumentError("maxAttempts must be a positive integer");
  }
  const rs = options.random ?? sharedRandomSource();

  const samples = new Map<string, SampledPermutation>();
  const working = source.copy();
  let classes = 0;
  let misses = 0;

  while (classes < canonicalCount && misses < maxAttempts) {
    const key = working.shuffle(rs).toString();
    if (samples.has(key)) {
      misses++;
      continue;
    }
    misses = 0;
    classes++;

    const canonical = new Permutation(working);
    samples.set(key, { permutation: canonical, canonical, weight: symmetricCount });

    const member = working.copy();
    let found = 0;
    let memberMisses = 0;
    while (found < symmetricCount && memberMisses < maxAttempts) {
      const memberKey = member.shuffleNodes(rs).toString();
      if (samples.has(memberKey)) {
        memberMisses++;
        continue;
      }
      memberMisses = 0;
      found++;
      samples.set(memberKey, {
        permutation: new Permutation(member),
        canonical,
        weight: 1,
      });
    }
    if (verbose && found < symmetricCount) {
      console.error(
        `[DEBUG] class ${key}: found ${found} of ${symmetricCount} members`,
      );
    }
  }

  if (verbose && classes < canonicalCount) {
    console.error(
      `[DEBUG] found ${classes} of ${canonicalCount} equivalence classes`,
    );
  }
  return Array.from(samples.values());
}
