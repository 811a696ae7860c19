/**
 * Permutations bound to the leaves of a tree.
 *
 * The i-th element of a {@link TreePermutation} sits on the i-th leaf of its
 * tree in leaf order. Reordering isomorphic sibling subtrees is a symmetry of
 * the tree: two permutations related by such reorderings are equivalent, and
 * each equivalence class has exactly one canonical member, the one where
 * every group of isomorphic siblings is sorted by the smallest element it
 * holds.
 *
 * @example
 * ```ts
 * const tp = new TreePermutation(createTleaf([2, 2]), [3, 2, 1, 0]);
 * tp.isCanonical(); // false
 * tp.canonical().toString(); // "0:1:2:3"
 * ```
 *
 * @module
 */
import { InvalidArgumentError } from "../shared/invalidArgumentError.ts";
import {
  type RandomSource,
  sharedRandomSource,
  shuffleInPlace,
} from "../shared/random.ts";
import { TreeIterator } from "../tree/iterators.ts";
import { shapeIds } from "../tree/shape.ts";
import type { NodeId, Tree } from "../tree/tree.ts";
import { Permutation } from "./permutation.ts";

/**
 * Metadata the canonicalization engine keeps for every tree node.
 */
export interface NodeTags {
  /** Element on a leaf, smallest element of the subtree otherwise. */
  readonly permutationIndex: number;
  /**
   * Child positions partitioned into groups of isomorphic subtrees, each
   * group ascending, groups ordered by their first position.
   */
  readonly groupedChildren: readonly (readonly number[])[];
}

export type TreePermutationSource =
  | number
  | bigint
  | readonly number[]
  | Permutation;

/**
 * The engine reorders the children of its tree in place. Instances sharing a
 * tree see each other's reorderings; use {@link TreePermutation.copy} to get
 * an independent one.
 */
export class TreePermutation extends Permutation {
  readonly tree: Tree;
  private readonly tags = new Map<NodeId, NodeTags>();
  private leafOrder: NodeId[] = [];

  /**
   * @param tree the tree whose leaves the elements are bound to.
   * @param source an identifier among the permutations of the leaf count,
   * or explicit elements, one per leaf.
   */
  constructor(tree: Tree, source: TreePermutationSource = 0n) {
    super(TreePermutation.elementsFor(tree, source));
    this.tree = tree;
    this.retag();
  }

  /** Number of permutations in every equivalence class on `tree`. */
  static classSize(tree: Tree): bigint {
    let size = 1n;
    const shapes = shapeIds(tree);
    for (const node of tree) {
      const counts = new Map<number, number>();
      for (const child of tree.children(node)) {
        const shape = shapes.get(child) ?? -1;
        counts.set(shape, (counts.get(shape) ?? 0) + 1);
      }
      for (const count of counts.values()) {
        for (let k = 2n; k <= BigInt(count); k++) {
          size *= k;
        }
      }
    }
    return size;
  }

  tagsOf(node: NodeId): NodeTags {
    const tags = this.tags.get(node);
    if (tags === undefined) {
      throw new InvalidArgumentError(`node ${node} is not in the tagged tree`);
    }
    return tags;
  }

  /** The leaf holding the element at `position`. */
  leafAt(position: number): NodeId {
    const leaf = this.leafOrder[position];
    if (!Number.isInteger(position) || leaf === undefined) {
      throw new InvalidArgumentError(`no leaf at position ${position}`);
    }
    return leaf;
  }

  /**
   * Recompute every node's tags from the elements and the current child
   * order.
   */
  retag(): void {
    const shapes = shapeIds(this.tree);
    const shapeOf = (node: NodeId): number => {
      const shape = shapes.get(node);
      if (shape === undefined) {
        throw new Error(`node ${node} has no shape`);
      }
      return shape;
    };

    this.tags.clear();
    this.leafOrder = [];
    for (const node of new TreeIterator(this.tree)) {
      const kids = this.tree.children(node);
      if (kids.length === 0) {
        this.tags.set(node, {
          permutationIndex: this.elems[this.leafOrder.length],
          groupedChildren: [],
        });
        this.leafOrder.push(node);
        continue;
      }

      const groups = new Map<number, number[]>();
      kids.forEach((child, position) => {
        const shape = shapeOf(child);
        const group = groups.get(shape);
        if (group === undefined) {
          groups.set(shape, [position]);
        } else {
          group.push(position);
        }
      });
      let smallest = Infinity;
      for (const child of kids) {
        smallest = Math.min(smallest, this.tagsOf(child).permutationIndex);
      }
      this.tags.set(node, {
        permutationIndex: smallest,
        groupedChildren: Array.from(groups.values()),
      });
    }
  }

  isCanonical(): boolean {
    for (const [node, tags] of this.tags) {
      const kids = this.tree.children(node);
      for (const group of tags.groupedChildren) {
        for (let k = 1; k < group.length; k++) {
          if (this.indexAt(kids, group[k - 1]) > this.indexAt(kids, group[k])) {
            return false;
          }
        }
      }
    }
    return true;
  }

  /**
   * Sort every group of isomorphic siblings by smallest element, in place.
   * Idempotent.
   */
  canonical(): this {
    this.reorderGroups((kids, group) =>
      group.slice().sort((a, b) =>
        this.indexAt(kids, a) - this.indexAt(kids, b)
      )
    );
    return this;
  }

  /**
   * Reorder the siblings within every isomorphism group at random. The
   * result stays in this permutation's equivalence class.
   */
  shuffleNodes(rs: RandomSource = sharedRandomSource()): this {
    this.reorderGroups((_, group) => shuffleInPlace(group.slice(), rs));
    return this;
  }

  /**
   * Draw random elements and canonicalize them. Canonical forms are not
   * drawn uniformly: larger classes are more likely.
   */
  override shuffle(rs: RandomSource = sharedRandomSource()): this {
    shuffleInPlace(this.elems, rs);
    this.retag();
    return this.canonical();
  }

  override shuffled(rs: RandomSource = sharedRandomSource()): TreePermutation {
    return this.copy().shuffle(rs);
  }

  /** Deep copy, tree included. */
  override copy(): TreePermutation {
    return new TreePermutation(this.tree.copy(), this.elems);
  }

  /**
   * True iff `other`, read on this tree (or on its own tree when it has one),
   * is in the same equivalence class as this permutation.
   */
  isEquivalent(other: Permutation): boolean {
    if (other.length !== this.length) {
      return false;
    }
    const mine = this.copy().canonical();
    const theirs = other instanceof TreePermutation
      ? other.copy().canonical()
      : new TreePermutation(this.tree.copy(), other).canonical();
    return mine.equals(theirs);
  }

  /**
   * Apply a new child order to every group of every internal node, then
   * read the elements back in the new leaf order.
   */
  private reorderGroups(
    arrange: (kids: readonly NodeId[], group: readonly number[]) => number[],
  ): void {
    for (const [node, tags] of this.tags) {
      const kids = this.tree.children(node);
      if (kids.length < 2) {
        continue;
      }
      const order = kids.map((_, position) => position);
      for (const group of tags.groupedChildren) {
        const arranged = arrange(kids, group);
        group.forEach((slot, k) => {
          order[slot] = arranged[k];
        });
      }
      this.tree.swap(node, order);
    }

    this.elems = this.tree.leaves().map((leaf) =>
      this.tagsOf(leaf).permutationIndex
    );
    this.retag();
  }

  private indexAt(kids: readonly NodeId[], position: number): number {
    return this.tagsOf(kids[position]).permutationIndex;
  }

  private static elementsFor(
    tree: Tree,
    source: TreePermutationSource,
  ): number[] {
    const leaves = tree.leaves().length;
    if (typeof source === "number" || typeof source === "bigint") {
      return Array.from(new Permutation(leaves, source));
    }
    if (source.length !== leaves) {
      throw new InvalidArgumentError(
        `expected ${leaves} elements, one per leaf, got ${source.length}`,
      );
    }
    return Array.from(new Permutation(source));
  }
}
