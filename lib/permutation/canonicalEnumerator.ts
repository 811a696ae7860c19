/**
 * Exhaustive walk over the canonical permutations of a tree.
 *
 * @module
 */
import { PermutationEnumerator } from "./enumerator.ts";
import { Permutation } from "./permutation.ts";
import { TreePermutation } from "./treePermutation.ts";

export interface CanonicalEnumeratorOptions {
  /** Report the walk's totals on standard error once it is exhausted. */
  verbose?: boolean;
}

/**
 * Yields one representative per equivalence class of `source`'s tree, in
 * ascending id order. Every permutation of the leaf count is visited, so the
 * walk costs `n!` retags: keep it to small trees. Every yielded permutation
 * owns a copy of `source`'s tree.
 *
 * Not restartable; create a new enumerator to walk again.
 */
export class CanonicalEnumerator implements IterableIterator<TreePermutation> {
  private readonly ids: PermutationEnumerator;
  private readonly verbose: boolean;
  private visited = 0;
  private yielded = 0;
  private exhausted = false;

  constructor(
    private readonly source: TreePermutation,
    options: CanonicalEnumeratorOptions = {},
  ) {
    this.ids = new PermutationEnumerator(Permutation.identity(source.length));
    this.verbose = options.verbose ?? false;
  }

  next(): IteratorResult<TreePermutation, undefined> {
    let step = this.ids.next();
    while (!step.done) {
      this.visited++;
      const candidate = new TreePermutation(this.source.tree, step.value);
      if (candidate.isCanonical()) {
        this.yielded++;
        return {
          done: false,
          value: new TreePermutation(this.source.tree.copy(), step.value),
        };
      }
      step = this.ids.next();
    }

    if (this.verbose && !this.exhausted) {
      console.error(
        `[DEBUG] ${this.yielded} canonical permutations out of ${this.visited}`,
      );
    }
    this.exhausted = true;
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): CanonicalEnumerator {
    return this;
  }
}
