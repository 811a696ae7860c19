import { assert, expect } from "chai";
import { describe, it } from "mocha";

import { Permutation } from "../../lib/permutation/permutation.ts";
import { InvalidArgumentError } from "../../lib/shared/invalidArgumentError.ts";
import { createRandomSource } from "../../lib/shared/random.ts";
import { factorial, isCompleteIndex } from "../../lib/util/numeric.ts";

describe("Permutation", () => {
  describe("identifiers", () => {
    it("starts from the identity", () => {
      assert.deepEqual(new Permutation(5, 0).elements, [0, 1, 2, 3, 4]);
      assert.strictEqual(Permutation.identity(5).id(), 0n);
    });

    it("ends with the reversal", () => {
      const last = new Permutation(5, 119);
      assert.deepEqual(last.elements, [4, 3, 2, 1, 0]);
      assert.strictEqual(last.id(), 119n);
    });

    it("puts the least significant digit first", () => {
      assert.deepEqual(new Permutation(3, 1).elements, [1, 0, 2]);
      assert.deepEqual(new Permutation(3, 3).elements, [0, 2, 1]);
    });

    it("decodes and encodes every id of small sizes", () => {
      for (let n = 0; n <= 5; n++) {
        const seen = new Set<string>();
        for (let id = 0n; id < factorial(n); id++) {
          const p = new Permutation(n, id);
          assert.strictEqual(p.id(), id);
          assert.isTrue(isCompleteIndex(p.elements));
          seen.add(p.toString());
        }
        assert.strictEqual(BigInt(seen.size), factorial(n));
      }
    });

    it("stays exact for large sizes", () => {
      const id = factorial(20) - 1n;
      const p = new Permutation(20, id);
      assert.strictEqual(p.id(), id);
      assert.deepEqual(p.elements, Array.from({ length: 20 }, (_, i) => 19 - i));
      assert.strictEqual(new Permutation(16, 18976).id(), 18976n);
    });

    it("reduces ids modulo n!", () => {
      assert.strictEqual(new Permutation(3, 6).id(), 0n);
      assert.strictEqual(new Permutation(3, 7n).id(), 1n);
    });

    it("handles the empty permutation", () => {
      const empty = new Permutation(0);
      assert.deepEqual(empty.elements, []);
      assert.strictEqual(empty.id(), 0n);
      assert.strictEqual(empty.toString(), "");
    });
  });

  describe("construction", () => {
    it("takes explicit elements", () => {
      const p = new Permutation([2, 0, 1]);
      assert.deepEqual([...p], [2, 0, 1]);
      assert.strictEqual(p.length, 3);
      assert.strictEqual(p.at(-1), 1);
    });

    it("copies another permutation", () => {
      const original = new Permutation([2, 0, 1]);
      const copy = new Permutation(original);
      copy.shuffle(createRandomSource("test-seed"));

      assert.deepEqual(original.elements, [2, 0, 1]);
      assert.isTrue(new Permutation(original).equals(original));
    });

    it("parses its textual form", () => {
      const p = Permutation.parse("2:0:1");
      assert.isTrue(p.equals([2, 0, 1]));
      assert.strictEqual(p.toString(), "2:0:1");
      assert.strictEqual(Permutation.parse("").length, 0);
    });

    it("rejects anything but a complete index", () => {
      expect(() => new Permutation([0, 2])).to.throw(InvalidArgumentError);
      expect(() => new Permutation([0, 0, 1])).to.throw(InvalidArgumentError);
      expect(() => Permutation.parse("0:x")).to.throw(InvalidArgumentError);
      expect(() => Permutation.parse("0:1:1")).to.throw(InvalidArgumentError);
      expect(() => Reflect.construct(Permutation, [{}])).to.throw(
        InvalidArgumentError,
      );
    });

    it("rejects invalid sizes and ids", () => {
      expect(() => new Permutation(-1)).to.throw(InvalidArgumentError);
      expect(() => new Permutation(2.5)).to.throw(InvalidArgumentError);
      expect(() => new Permutation(3, -1n)).to.throw(InvalidArgumentError);
      expect(() => new Permutation(3, 1.5)).to.throw(InvalidArgumentError);
    });
  });

  describe("algebra", () => {
    it("inverts positions", () => {
      const p = new Permutation([2, 0, 1]);
      assert.deepEqual(p.inverse().elements, [1, 2, 0]);

      for (let id = 0n; id < 24n; id++) {
        const q = new Permutation(4, id);
        const inverse = q.inverse();
        assert.deepEqual(q.elements.map((value) => inverse.at(value)), [0, 1, 2, 3]);
      }
    });

    it("adds identifiers modulo n!", () => {
      const a = new Permutation(4, 5);
      const b = new Permutation(4, 22);

      assert.strictEqual(a.add(b).id(), 3n);
      assert.isTrue(a.add(Permutation.identity(4)).equals(a));
      for (let id = 0n; id < 24n; id++) {
        const c = new Permutation(4, id);
        assert.strictEqual(a.add(c).id(), (5n + id) % 24n);
      }
    });

    it("refuses to add permutations of different sizes", () => {
      expect(() => new Permutation(3).add(new Permutation(4))).to.throw(
        InvalidArgumentError,
      );
    });

    it("builds the reordering between two sequences", () => {
      const t = Permutation.transform([10, 20, 30], [30, 10, 20]);
      assert.deepEqual(t.elements, [2, 0, 1]);
      expect(() => Permutation.transform([10, 20, 30], [10, 20, 40])).to.throw(
        InvalidArgumentError,
      );
      expect(() => Permutation.transform([10, 20], [20])).to.throw(
        InvalidArgumentError,
      );
    });
  });

  describe("randomness", () => {
    const testSeed = "test-seed";

    it("shuffles in place and chains", () => {
      const p = new Permutation(8);
      const result = p.shuffle(createRandomSource(testSeed));

      assert.strictEqual(result, p);
      assert.isTrue(isCompleteIndex(p.elements));
    });

    it("is reproducible with a seeded source", () => {
      const first = new Permutation(8).shuffle(createRandomSource(testSeed));
      const second = new Permutation(8).shuffle(createRandomSource(testSeed));
      assert.isTrue(first.equals(second));
    });

    it("shuffled leaves the original alone", () => {
      const p = new Permutation(8);
      const shuffled = p.shuffled(createRandomSource(testSeed));

      assert.notStrictEqual(shuffled, p);
      assert.strictEqual(p.id(), 0n);
    });
  });

  it("cycles its elements for oversubscription", () => {
    const p = new Permutation([2, 0, 1]);
    assert.deepEqual(p.cycle(7), [2, 0, 1, 2, 0, 1, 2]);
    assert.deepEqual(p.cycle(0), []);
    expect(() => new Permutation(0).cycle(1)).to.throw(InvalidArgumentError);
    expect(() => p.cycle(-1)).to.throw(InvalidArgumentError);
  });
});
