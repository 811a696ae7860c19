/**
 * Arena-backed ordered trees.
 *
 * A {@link Tree} owns every node it ever created. Nodes are addressed by
 * stable integer ids and the parent/child relations are plain id fields, so
 * there are no reference cycles and navigation in either direction is O(1).
 * A tree and its nodes share one API: every query takes the node it acts on,
 * and the traversal helpers default to the tree's root.
 *
 * @example
 * ```ts
 * const tree = new Tree();
 * const a = tree.addChild(tree.root);
 * tree.addChild(a);
 * tree.addChild(a);
 * tree.coords(tree.lastLeaf()); // [0, 1]
 * ```
 *
 * @module
 */
import { InvalidArgumentError } from "../shared/invalidArgumentError.ts";
import { isCompleteIndex } from "../util/numeric.ts";
import { TreeIterator } from "./iterators.ts";

export type NodeId = number;

export type NodePredicate = (node: NodeId) => boolean;

export class Tree implements Iterable<NodeId> {
  /** The root is always the first node of the arena. */
  readonly root: NodeId = 0;

  private readonly parents: (NodeId | undefined)[] = [];
  private readonly kids: NodeId[][] = [];

  constructor() {
    this.createNode();
  }

  /** Number of nodes in the arena, reachable from the root or not. */
  get capacity(): number {
    return this.kids.length;
  }

  /**
   * Allocate a detached node. It joins the tree once connected.
   */
  createNode(): NodeId {
    this.parents.push(undefined);
    this.kids.push([]);
    return this.kids.length - 1;
  }

  /**
   * Allocate a node and append it to `parent`'s children.
   */
  addChild(parent: NodeId): NodeId {
    this.requireNode(parent);
    const child = this.createNode();
    this.link(parent, child);
    return child;
  }

  has(node: unknown): node is NodeId {
    return typeof node === "number" && Number.isInteger(node) && node >= 0 &&
      node < this.kids.length;
  }

  /**
   * Append `children` to `parent`, in order.
   */
  connectChildren(parent: NodeId, ...children: NodeId[]): void {
    this.requireNode(parent);
    for (const child of children) {
      this.requireNode(child);
      if (child === this.root) {
        throw new InvalidArgumentError("the root cannot become a child");
      }
      if (this.parents[child] !== undefined) {
        throw new InvalidArgumentError(`node ${child} already has a parent`);
      }
      if (this.isAncestorOrSelf(child, parent)) {
        throw new InvalidArgumentError(
          `connecting ${child} under ${parent} would create a cycle`,
        );
      }
      this.link(parent, child);
    }
  }

  connectParent(child: NodeId, parent: NodeId): void {
    this.connectChildren(parent, child);
  }

  parent(node: NodeId): NodeId | undefined {
    this.requireNode(node);
    return this.parents[node];
  }

  children(node: NodeId): readonly NodeId[] {
    this.requireNode(node);
    return this.kids[node];
  }

  isLeaf(node: NodeId): boolean {
    return this.children(node).length === 0;
  }

  isRoot(node: NodeId): boolean {
    return this.parent(node) === undefined;
  }

  arity(node: NodeId): number {
    return this.children(node).length;
  }

  /** Position of `node` among its siblings, 0 for a parentless node. */
  index(node: NodeId): number {
    const parent = this.parent(node);
    return parent === undefined ? 0 : this.kids[parent].indexOf(node);
  }

  /** The parentless ancestor of `node`. */
  rootOf(node: NodeId): NodeId {
    let current = node;
    let parent = this.parent(current);
    while (parent !== undefined) {
      current = parent;
      parent = this.parents[current];
    }
    return current;
  }

  /** Distance from `node` up to its root. */
  depth(node: NodeId): number {
    let depth = 0;
    let parent = this.parent(node);
    while (parent !== undefined) {
      depth++;
      parent = this.parents[parent];
    }
    return depth;
  }

  /** Distance from `from` down to its deepest leaf. */
  maxDepth(from: NodeId = this.root): number {
    const base = this.depth(from);
    let max = 0;
    for (const leaf of this.leaves(from)) {
      max = Math.max(max, this.depth(leaf) - base);
    }
    return max;
  }

  /**
   * Child indices leading from the root of `node` down to `node`.
   */
  coords(node: NodeId): number[] {
    const path: number[] = [];
    let current = node;
    let parent = this.parent(current);
    while (parent !== undefined) {
      path.push(this.kids[parent].indexOf(current));
      current = parent;
      parent = this.parents[current];
    }
    return path.reverse();
  }

  /**
   * Resolve a descendant of `from` by relative coordinates. The walk stops
   * early at a leaf.
   */
  at(coords: readonly number[], from: NodeId = this.root): NodeId {
    let current = from;
    for (const i of coords) {
      const kids = this.children(current);
      if (kids.length === 0) {
        return current;
      }
      if (!Number.isInteger(i) || i < 0 || i >= kids.length) {
        throw new InvalidArgumentError(
          `no child ${i} under node ${current} (arity ${kids.length})`,
        );
      }
      current = kids[i];
    }
    return current;
  }

  /**
   * Reorder the children of `node`: the new i-th child is the old
   * `order[i]`-th one.
   */
  swap(node: NodeId, order: readonly number[]): void {
    const kids = this.children(node);
    if (order.length !== kids.length || !isCompleteIndex(order)) {
      throw new InvalidArgumentError(
        "swap order of tree children must contain a complete index",
      );
    }
    this.kids[node] = order.map((i) => kids[i]);
  }

  /**
   * Nodes `i` levels below `from`, left to right. A leaf reached before that
   * depth stands for its own branch.
   */
  level(i: number, from: NodeId = this.root): NodeId[] {
    let frontier = [from];
    for (let d = 0; d < i; d++) {
      frontier = frontier.flatMap((node) =>
        this.kids[node].length === 0 ? [node] : this.kids[node]
      );
    }
    return frontier;
  }

  /**
   * Pre-order visit of `from` and its descendants. A non-negative `depth`
   * bounds how many levels below `from` are visited.
   */
  apply(
    fn: (node: NodeId) => void,
    from: NodeId = this.root,
    depth = -1,
  ): void {
    this.requireNode(from);
    const stack: { node: NodeId; depth: number }[] = [{ node: from, depth }];
    while (stack.length > 0) {
      const item = stack.pop();
      if (item === undefined) {
        throw new Error("stack underflow");
      }
      fn(item.node);
      if (item.depth === 0) {
        continue;
      }
      const kids = this.kids[item.node];
      for (let c = kids.length - 1; c >= 0; c--) {
        stack.push({ node: kids[c], depth: item.depth - 1 });
      }
    }
  }

  /**
   * Bottom-up fold resolving every subtree to one of its leaves: a leaf
   * resolves to itself, an internal node to `fn` of its children's results.
   */
  reduce(
    fn: (nodes: NodeId[]) => NodeId = (nodes) => nodes[0],
    from: NodeId = this.root,
  ): NodeId {
    const resolved = new Map<NodeId, NodeId>();
    for (const node of new TreeIterator(this, { from })) {
      const kids = this.kids[node];
      resolved.set(
        node,
        kids.length === 0 ? node : fn(kids.map((c) => this.resolvedOf(resolved, c))),
      );
    }
    return this.resolvedOf(resolved, from);
  }

  /** Nodes under `from` (inclusive) satisfying `cond`, in walk order. */
  select(cond: NodePredicate = () => true, from: NodeId = this.root): NodeId[] {
    return Array.from(new TreeIterator(this, { from, filter: cond }));
  }

  /** Leaves under `from`, left to right. */
  leaves(from: NodeId = this.root): NodeId[] {
    return this.select((node) => this.kids[node].length === 0, from);
  }

  /** Number of nodes in the subtree of `from`. */
  size(from: NodeId = this.root): number {
    return new TreeIterator(this, { from }).count();
  }

  /**
   * Detach every node under `from` matching `cond` from its parent.
   * Returns the matched nodes in walk order. When a match lies below another
   * match, only the outermost detachment affects the tree reachable from
   * `from`.
   */
  prune(cond: NodePredicate = () => true, from: NodeId = this.root): NodeId[] {
    const eliminated = this.select(cond, from);
    for (const node of eliminated) {
      this.detach(node);
    }
    return eliminated;
  }

  /**
   * Splice `node` out: its children take its place under its parent.
   */
  remove(node: NodeId): void {
    const parent = this.parent(node);
    if (parent === undefined) {
      throw new InvalidArgumentError(`cannot remove parentless node ${node}`);
    }
    const position = this.kids[parent].indexOf(node);
    const orphans = this.kids[node];
    for (const orphan of orphans) {
      this.parents[orphan] = parent;
    }
    this.kids[parent].splice(position, 1, ...orphans);
    this.kids[node] = [];
    this.parents[node] = undefined;
  }

  firstLeaf(from: NodeId = this.root): NodeId {
    let current = from;
    while (this.children(current).length > 0) {
      current = this.kids[current][0];
    }
    return current;
  }

  lastLeaf(from: NodeId = this.root): NodeId {
    let current = from;
    let kids = this.children(current);
    while (kids.length > 0) {
      current = kids[kids.length - 1];
      kids = this.kids[current];
    }
    return current;
  }

  /** Deep copy; node ids are preserved. */
  copy(): Tree {
    const tree = new Tree();
    tree.parents.splice(0, tree.parents.length, ...this.parents);
    tree.kids.splice(0, tree.kids.length, ...this.kids.map((k) => k.slice()));
    return tree;
  }

  [Symbol.iterator](): TreeIterator {
    return new TreeIterator(this);
  }

  private link(parent: NodeId, child: NodeId): void {
    this.parents[child] = parent;
    this.kids[parent].push(child);
  }

  private detach(node: NodeId): void {
    const parent = this.parents[node];
    if (parent === undefined) {
      return;
    }
    this.kids[parent] = this.kids[parent].filter((c) => c !== node);
    this.parents[node] = undefined;
  }

  private isAncestorOrSelf(candidate: NodeId, node: NodeId): boolean {
    let current: NodeId | undefined = node;
    while (current !== undefined) {
      if (current === candidate) {
        return true;
      }
      current = this.parents[current];
    }
    return false;
  }

  private resolvedOf(resolved: Map<NodeId, NodeId>, node: NodeId): NodeId {
    const leaf = resolved.get(node);
    if (leaf === undefined) {
      throw new Error(`node ${node} was not reduced before its parent`);
    }
    return leaf;
  }

  private requireNode(node: unknown): asserts node is NodeId {
    if (!this.has(node)) {
      throw new InvalidArgumentError(`not a node of this tree: ${String(node)}`);
    }
  }
}
