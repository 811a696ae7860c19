/**
 * ASCII rendering of trees.
 *
 * @module
 */
import type { NodeId, Tree } from "./tree.ts";

/**
 * One line per node below `from`, drawn with box connectors:
 *
 * ```
 * +-- [0]
 * |   +-- [0, 0]
 * |   +-- [0, 1]
 * +-- [1]
 * ```
 *
 * Nodes are labelled with their coordinates unless `label` says otherwise.
 */
export function renderTree(
  tree: Tree,
  label: (node: NodeId) => string = (node) =>
    `[${tree.coords(node).join(", ")}]`,
  from: NodeId = tree.root,
): string {
  const lines: string[] = [];
  const walk = (node: NodeId, prefix: string): void => {
    const kids = tree.children(node);
    kids.forEach((child, i) => {
      lines.push(`${prefix}+-- ${label(child)}`);
      walk(child, prefix + (i < kids.length - 1 ? "|   " : "    "));
    });
  };
  walk(from, "");
  return lines.join("\n");
}
