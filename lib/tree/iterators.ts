/**
 * Tree walks.
 *
 * Both walks are lazy and finite. An optional filter restricts which nodes
 * are yielded; every node is still walked.
 *
 * @module
 */
import type { NodeId, NodePredicate, Tree } from "./tree.ts";

export interface WalkOptions {
  /** Subtree to walk, the tree's root by default. */
  from?: NodeId;
  filter?: NodePredicate;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Children-first walk starting at the leftmost, deepest leaf:
 *
 * ```
 *  6----5----4
 *  |    |
 *  |    +----3
 *  |
 *  +----2----1
 *       |
 *       +----0
 * ```
 */
export class TreeIterator implements IterableIterator<NodeId> {
  private readonly from: NodeId;
  private readonly filter: NodePredicate | undefined;
  private current: NodeId | undefined;

  constructor(private readonly tree: Tree, options: WalkOptions = {}) {
    this.from = options.from ?? tree.root;
    this.filter = options.filter;
    this.current = tree.firstLeaf(this.from);
  }

  /** Rewind to the first leaf without allocating a new iterator. */
  reset(): void {
    this.current = this.tree.firstLeaf(this.from);
  }

  next(): IteratorResult<NodeId, undefined> {
    while (this.current !== undefined) {
      const node = this.current;
      this.current = this.advance(node);
      if (this.filter === undefined || this.filter(node)) {
        return { done: false, value: node };
      }
    }
    return DONE;
  }

  /** Drain the iterator, returning how many nodes it yielded. */
  count(): number {
    let n = 0;
    while (!this.next().done) {
      n++;
    }
    return n;
  }

  [Symbol.iterator](): TreeIterator {
    return this;
  }

  private advance(node: NodeId): NodeId | undefined {
    const parent = this.tree.parent(node);
    if (node === this.from || parent === undefined) {
      return undefined;
    }
    const siblings = this.tree.children(parent);
    const next = siblings.indexOf(node) + 1;
    if (next === siblings.length) {
      return parent;
    }
    return this.tree.firstLeaf(siblings[next]);
  }
}

/**
 * Round-robin walk spreading consecutive nodes across branches:
 *
 * ```
 *  0----2----6
 *  |    |
 *  |    +----4
 *  |
 *  +----1----5
 *       |
 *       +----3
 * ```
 *
 * Every step restarts at the walk's root and follows per-node visit counters
 * down to the next node whose turn it is.
 */
export class ScatterTreeIterator implements IterableIterator<NodeId> {
  private readonly from: NodeId;
  private readonly filter: NodePredicate | undefined;
  private readonly visits = new Map<NodeId, number>();
  private readonly total: number;
  private walked = 0;

  constructor(private readonly tree: Tree, options: WalkOptions = {}) {
    this.from = options.from ?? tree.root;
    this.filter = options.filter;
    this.total = tree.size(this.from);
  }

  next(): IteratorResult<NodeId, undefined> {
    while (this.walked < this.total) {
      const node = this.step();
      this.walked++;
      if (this.filter === undefined || this.filter(node)) {
        return { done: false, value: node };
      }
    }
    return DONE;
  }

  count(): number {
    let n = 0;
    while (!this.next().done) {
      n++;
    }
    return n;
  }

  [Symbol.iterator](): ScatterTreeIterator {
    return this;
  }

  private step(): NodeId {
    let node = this.from;
    for (;;) {
      // -2: never reached, -1: yielded, k >= 0: k-th child's turn
      const visit = (this.visits.get(node) ?? -2) + 1;
      this.visits.set(node, visit);
      if (visit < 0) {
        return node;
      }
      const kids = this.tree.children(node);
      if (visit < kids.length) {
        node = kids[visit];
      } else {
        this.visits.set(node, -1);
        node = this.from;
      }
    }
  }
}
