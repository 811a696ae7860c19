/**
 * Permutations of `0..n-1` and their integer identifiers.
 *
 * Every permutation of `n` elements has a unique identifier in `[0, n!)`.
 * The identifier is the permutation's Lehmer code read as a mixed-radix
 * number whose least significant digit is the rank of the first element:
 *
 * ```
 * id = r0 + n * (r1 + (n - 1) * (r2 + ...))
 * ```
 *
 * where `ri` is the rank of the i-th element among the values not used by
 * the elements before it. Identifiers are bigints so that any `n` is exact.
 *
 * @example
 * ```ts
 * const p = new Permutation(5, 119n);
 * p.toString(); // "4:3:2:1:0"
 * p.id(); // 119n
 * Permutation.parse("4:3:2:1:0").equals(p); // true
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
import { argsort, factorial, isCompleteIndex, rankOf } from "../util/numeric.ts";

/**
 * A size (paired with an identifier), an explicit element list, the textual
 * form `"i:j:k"`, or a permutation to copy.
 */
export type PermutationSource =
  | number
  | readonly number[]
  | string
  | Permutation;

export class Permutation implements Iterable<number> {
  protected elems: number[];

  /**
   * @param source see {@link PermutationSource}.
   * @param id identifier of the permutation when `source` is a size,
   * reduced modulo `n!`; ignored otherwise.
   */
  constructor(source: PermutationSource, id: number | bigint = 0n) {
    this.elems = Permutation.resolve(source, id);
  }

  static identity(n: number): Permutation {
    return new Permutation(n, 0n);
  }

  static parse(text: string): Permutation {
    return new Permutation(text);
  }

  /**
   * The permutation reordering `src` into `dst`: for each element of `dst`,
   * its position in `src`.
   */
  static transform(
    src: readonly number[],
    dst: readonly number[],
  ): Permutation {
    const positions = dst.map((value) => rankOf(src, value));
    if (src.length !== dst.length || !isCompleteIndex(positions)) {
      throw new InvalidArgumentError(
        "transform destination must be a reordering of its source",
      );
    }
    return new Permutation(positions);
  }

  get length(): number {
    return this.elems.length;
  }

  get elements(): readonly number[] {
    return this.elems;
  }

  at(i: number): number | undefined {
    return this.elems.at(i);
  }

  /**
   * @returns the unique identifier of this permutation in `[0, n!)`.
   */
  id(): bigint {
    const remaining = this.elems.map((_, i) => i);
    let result = 0n;
    let multiplier = 1n;
    for (const element of this.elems) {
      const rank = rankOf(remaining, element);
      result += multiplier * BigInt(rank);
      multiplier *= BigInt(remaining.length);
      remaining.splice(rank, 1);
    }
    return result;
  }

  /**
   * Group operation on identifiers: `a.add(b).id()` is
   * `(a.id() + b.id()) mod n!`. This is not function composition.
   */
  add(other: Permutation): Permutation {
    if (other.length !== this.length) {
      throw new InvalidArgumentError(
        `cannot add permutations of ${this.length} and ${other.length} elements`,
      );
    }
    return new Permutation(this.length, this.id() + other.id());
  }

  /** `p.inverse().at(p.at(i)) === i` for every position `i`. */
  inverse(): Permutation {
    return new Permutation(argsort(this.elems));
  }

  /**
   * Replace the elements with a uniformly random permutation, in place.
   */
  shuffle(rs: RandomSource = sharedRandomSource()): this {
    shuffleInPlace(this.elems, rs);
    return this;
  }

  shuffled(rs: RandomSource = sharedRandomSource()): Permutation {
    return this.copy().shuffle(rs);
  }

  copy(): Permutation {
    return new Permutation(this.elems);
  }

  /**
   * The first `count` values of the elements repeated end to end, e.g. to
   * place more workers than there are leaves.
   */
  cycle(count: number): number[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new InvalidArgumentError(`invalid cycle length: ${count}`);
    }
    if (count > 0 && this.elems.length === 0) {
      throw new InvalidArgumentError("cannot cycle an empty permutation");
    }
    return Array.from(
      { length: count },
      (_, i) => this.elems[i % this.elems.length],
    );
  }

  equals(other: Permutation | readonly number[]): boolean {
    const elements = other instanceof Permutation ? other.elements : other;
    return elements.length === this.elems.length &&
      elements.every((value, i) => value === this.elems[i]);
  }

  /** Colon separated elements, as read back by {@link Permutation.parse}. */
  toString(): string {
    return this.elems.join(":");
  }

  [Symbol.iterator](): Iterator<number> {
    return this.elems[Symbol.iterator]();
  }

  private static resolve(source: unknown, id: number | bigint): number[] {
    if (typeof source === "number") {
      return Permutation.decode(source, id);
    }
    if (source instanceof Permutation) {
      return source.elems.slice();
    }
    if (typeof source === "string") {
      return Permutation.checked(Permutation.tokens(source));
    }
    if (Array.isArray(source)) {
      return Permutation.checked(source);
    }
    throw new InvalidArgumentError(
      "expected a size, an element list, a permutation string or a permutation",
    );
  }

  /**
   * Inverse of {@link Permutation.id}: peel mixed-radix digits off `id`,
   * each one picking the next element among the unused values.
   */
  private static decode(n: number, id: number | bigint): number[] {
    if (!Number.isInteger(n) || n < 0) {
      throw new InvalidArgumentError(
        `permutation size must be a non-negative integer, got: ${n}`,
      );
    }
    if (typeof id === "number" && !Number.isInteger(id)) {
      throw new InvalidArgumentError(`permutation id must be an integer: ${id}`);
    }
    let rest = BigInt(id);
    if (rest < 0n) {
      throw new InvalidArgumentError(`permutation id must be non-negative: ${id}`);
    }
    rest %= factorial(n);

    const slots = Array.from({ length: n }, (_, i) => i);
    const elements: number[] = [];
    while (rest > 0n && slots.length > 0) {
      const radix = BigInt(slots.length);
      const digit = rest % radix;
      rest = (rest - digit) / radix;
      elements.push(...slots.splice(Number(digit), 1));
    }
    return elements.concat(slots);
  }

  private static tokens(text: string): number[] {
    if (text.trim() === "") {
      return [];
    }
    return text.split(":").map((token) => {
      if (!/^\s*\d+\s*$/.test(token)) {
        throw new InvalidArgumentError(`malformed permutation string: ${text}`);
      }
      return Number(token);
    });
  }

  private static checked(elements: readonly unknown[]): number[] {
    if (!isCompleteIndex(elements)) {
      throw new InvalidArgumentError(
        "permutation elements must be a complete index",
      );
    }
    return elements.map(Number);
  }
}
