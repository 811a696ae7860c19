/**
 * Tree-shaped permutations: integer identifiers, canonical forms and
 * enumeration of equivalence classes.
 *
 * This module re-exports the public API:
 * - arena trees with their walks and synthetic generators
 * - permutations of `0..n-1` and their bigint identifiers
 * - the canonicalization engine binding permutations to tree leaves
 * - exhaustive and random enumeration of equivalence classes
 *
 * @example
 * ```ts
 * import { CanonicalEnumerator, createTleaf, TreePermutation } from "topoperm";
 * const tp = new TreePermutation(createTleaf([2, 2]));
 * for (const representative of new CanonicalEnumerator(tp)) {
 *   console.log(representative.toString()); // 0:1:2:3, 0:2:1:3, 0:3:1:2
 * }
 * ```
 *
 * @module
 */
// Errors and randomness
export { InvalidArgumentError } from "./shared/invalidArgumentError.ts";
export {
  createRandomSource,
  type RandomSource,
  sharedRandomSource,
  shuffleInPlace,
} from "./shared/random.ts";

// Numeric helpers
export {
  argmin,
  argsort,
  factorial,
  isCompleteIndex,
  rankOf,
} from "./util/numeric.ts";

// Trees
export { type NodeId, type NodePredicate, Tree } from "./tree/tree.ts";
export {
  ScatterTreeIterator,
  TreeIterator,
  type WalkOptions,
} from "./tree/iterators.ts";
export { NodeTable, tagLeaves } from "./tree/nodeTable.ts";
export { isomorphic, ShapeTable, shapeIds } from "./tree/shape.ts";
export { createTleaf } from "./tree/tleaf.ts";
export { renderTree } from "./tree/render.ts";

// Permutations
export {
  Permutation,
  type PermutationSource,
} from "./permutation/permutation.ts";
export { PermutationEnumerator } from "./permutation/enumerator.ts";
export {
  type NodeTags,
  TreePermutation,
  type TreePermutationSource,
} from "./permutation/treePermutation.ts";
export {
  CanonicalEnumerator,
  type CanonicalEnumeratorOptions,
} from "./permutation/canonicalEnumerator.ts";
export {
  DEFAULT_SAMPLER_OPTIONS,
  type SampledPermutation,
  sampleEquivalenceClasses,
  type SamplerOptions,
} from "./permutation/sampler.ts";
