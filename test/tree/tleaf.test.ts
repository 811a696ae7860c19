import { assert, expect } from "chai";
import { describe, it } from "mocha";

import { InvalidArgumentError } from "../../lib/shared/invalidArgumentError.ts";
import { NodeTable, tagLeaves } from "../../lib/tree/nodeTable.ts";
import { renderTree } from "../../lib/tree/render.ts";
import { createTleaf } from "../../lib/tree/tleaf.ts";

describe("synthetic trees", () => {
  it("gives every node of a level the same arity", () => {
    const tree = createTleaf([2, 3]);

    assert.strictEqual(tree.leaves().length, 6);
    assert.strictEqual(tree.size(), 9);
    assert.deepEqual(tree.level(1).map((node) => tree.arity(node)), [3, 3]);
    assert.strictEqual(tree.maxDepth(), 2);
  });

  it("degenerates to a lone leaf without arities", () => {
    const tree = createTleaf([]);
    assert.deepEqual(tree.leaves(), [tree.root]);
  });

  it("rejects empty or fractional arities", () => {
    expect(() => createTleaf([0])).to.throw(InvalidArgumentError);
    expect(() => createTleaf([2, 1.5])).to.throw(InvalidArgumentError);
  });
});

describe("node tables", () => {
  it("tags leaves with their position", () => {
    const tree = createTleaf([2, 2]);
    const tags = tagLeaves(tree);

    assert.strictEqual(tags.size, 4);
    assert.strictEqual(tags.get(3), 0);
    assert.strictEqual(tags.get(6), 3);
    assert.isFalse(tags.has(tree.root));
  });

  it("stores caller data per node", () => {
    const table = new NodeTable<string>().set(0, "Machine").set(1, "Core");

    assert.strictEqual(table.get(1), "Core");
    assert.isTrue(table.delete(1));
    assert.isUndefined(table.get(1));
    assert.deepEqual(Array.from(table.entries()), [[0, "Machine"]]);
  });
});

describe("renderTree", () => {
  it("draws coordinates with connectors", () => {
    assert.strictEqual(
      renderTree(createTleaf([2, 2])),
      [
        "+-- [0]",
        "|   +-- [0, 0]",
        "|   +-- [0, 1]",
        "+-- [1]",
        "    +-- [1, 0]",
        "    +-- [1, 1]",
      ].join("\n"),
    );
  });

  it("accepts custom labels", () => {
    const tree = createTleaf([2]);
    assert.strictEqual(renderTree(tree, (node) => `#${node}`), "+-- #1\n+-- #2");
  });
});
