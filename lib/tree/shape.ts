/**
 * Structural shape of ordered trees.
 *
 * Two subtrees have the same shape when they have the same number of nodes
 * and the same arity at every corresponding node of a parallel pre-order
 * walk. Shapes are hash-consed into small integer ids, so comparing two
 * subtrees after {@link shapeIds} is a single integer comparison.
 *
 * @module
 */
import { TreeIterator } from "./iterators.ts";
import type { NodeId, Tree } from "./tree.ts";

/**
 * Interning table from child-shape lists to shape ids. Sharing one table
 * between calls makes ids comparable across trees.
 */
export class ShapeTable {
  private readonly ids = new Map<string, number>();

  intern(childShapes: readonly number[]): number {
    const key = childShapes.join(",");
    let id = this.ids.get(key);
    if (id === undefined) {
      id = this.ids.size;
      this.ids.set(key, id);
    }
    return id;
  }

  get size(): number {
    return this.ids.size;
  }
}

/**
 * Shape id of every node under `from`, computed bottom-up.
 */
export function shapeIds(
  tree: Tree,
  from: NodeId = tree.root,
  table: ShapeTable = new ShapeTable(),
): Map<NodeId, number> {
  const shapes = new Map<NodeId, number>();
  for (const node of new TreeIterator(tree, { from })) {
    shapes.set(
      node,
      table.intern(tree.children(node).map((c) => shapeOf(shapes, c))),
    );
  }
  return shapes;
}

/**
 * True iff the subtree of `lft` in `lftTree` has the same shape as the
 * subtree of `rgt` in `rgtTree`.
 */
export function isomorphic(
  lftTree: Tree,
  lft: NodeId,
  rgtTree: Tree,
  rgt: NodeId,
): boolean {
  const table = new ShapeTable();
  return shapeOf(shapeIds(lftTree, lft, table), lft) ===
    shapeOf(shapeIds(rgtTree, rgt, table), rgt);
}

function shapeOf(shapes: Map<NodeId, number>, node: NodeId): number {
  const shape = shapes.get(node);
  if (shape === undefined) {
    throw new Error(`node ${node} has no shape yet`);
  }
  return shape;
}
