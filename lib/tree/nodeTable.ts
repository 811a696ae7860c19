/**
 * Typed side tables attaching caller data to tree nodes.
 *
 * @module
 */
import { TreeIterator } from "./iterators.ts";
import type { NodeId, Tree } from "./tree.ts";

export class NodeTable<T> {
  private readonly values = new Map<NodeId, T>();

  get(node: NodeId): T | undefined {
    return this.values.get(node);
  }

  set(node: NodeId, value: T): this {
    this.values.set(node, value);
    return this;
  }

  has(node: NodeId): boolean {
    return this.values.has(node);
  }

  delete(node: NodeId): boolean {
    return this.values.delete(node);
  }

  get size(): number {
    return this.values.size;
  }

  entries(): IterableIterator<[NodeId, T]> {
    return this.values.entries();
  }
}

/**
 * Tag every leaf under `from` with its left-to-right position.
 */
export function tagLeaves(
  tree: Tree,
  from: NodeId = tree.root,
): NodeTable<number> {
  const tags = new NodeTable<number>();
  let position = 0;
  for (
    const leaf of new TreeIterator(tree, {
      from,
      filter: (node) => tree.isLeaf(node),
    })
  ) {
    tags.set(leaf, position++);
  }
  return tags;
}
