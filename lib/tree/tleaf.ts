/**
 * Synthetic balanced trees.
 *
 * @module
 */
import { InvalidArgumentError } from "../shared/invalidArgumentError.ts";
import { type NodeId, Tree } from "./tree.ts";

/**
 * Build a tree where every node at depth `d` has `arities[d]` children.
 * Nodes are allocated level by level, so ids follow breadth-first order.
 *
 * @example
 * ```ts
 * createTleaf([2, 3]).leaves().length; // 6
 * ```
 */
export function createTleaf(arities: readonly number[]): Tree {
  for (const arity of arities) {
    if (!Number.isInteger(arity) || arity < 1) {
      throw new InvalidArgumentError(`invalid arity: ${arity}`);
    }
  }

  const tree = new Tree();
  let frontier = [tree.root];
  for (const arity of arities) {
    const next: NodeId[] = [];
    for (const node of frontier) {
      for (let c = 0; c < arity; c++) {
        next.push(tree.addChild(node));
      }
    }
    frontier = next;
  }
  return tree;
}
