/**
 * Exhaustive walk over permutations of a given size.
 *
 * @module
 */
import { factorial } from "../util/numeric.ts";
import { Permutation } from "./permutation.ts";

/**
 * Yields every permutation of `start.length` elements in ascending id order,
 * from `start` up to the last one (id `n! - 1`). There are `n!` of them:
 * only iterate small sizes to the end.
 */
export class PermutationEnumerator implements IterableIterator<Permutation> {
  private readonly size: number;
  private readonly first: bigint;
  private readonly end: bigint;
  private current: bigint;

  constructor(start: Permutation) {
    this.size = start.length;
    this.first = start.id();
    this.end = factorial(this.size);
    this.current = this.first;
  }

  /** Identifier of the next permutation to be yielded. */
  get position(): bigint {
    return this.current;
  }

  reset(): void {
    this.current = this.first;
  }

  next(): IteratorResult<Permutation, undefined> {
    if (this.current >= this.end) {
      return { done: true, value: undefined };
    }
    const value = new Permutation(this.size, this.current);
    this.current++;
    return { done: false, value };
  }

  [Symbol.iterator](): PermutationEnumerator {
    return this;
  }
}
