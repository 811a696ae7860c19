/**
 * Small numeric helpers over integer sequences.
 *
 * @module
 */
import { InvalidArgumentError } from "../shared/invalidArgumentError.ts";

/**
 * @param n a non-negative integer.
 * @returns n! as a bigint, with 0! = 1.
 */
export function factorial(n: number): bigint {
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError(
      `factorial is defined on non-negative integers, got: ${n}`,
    );
  }

  let result = 1n;
  for (let i = 2n; i <= BigInt(n); i++) {
    result *= i;
  }
  return result;
}

/**
 * @returns the index of the first element equal to `value`, or -1.
 */
export function rankOf(sequence: readonly number[], value: number): number {
  return sequence.indexOf(value);
}

/**
 * The index permutation that would sort `sequence` ascending.
 * Equal elements keep their relative order.
 */
export function argsort(sequence: readonly number[]): number[] {
  return sequence
    .map((value, index) => ({ value, index }))
    .sort((a, b) => a.value - b.value || a.index - b.index)
    .map(({ index }) => index);
}

/**
 * @returns the index of the smallest element (the first one on ties), or -1
 * for an empty sequence.
 */
export function argmin(sequence: readonly number[]): number {
  let best = -1;
  for (let i = 0; i < sequence.length; i++) {
    if (best < 0 || sequence[i] < sequence[best]) {
      best = i;
    }
  }
  return best;
}

/**
 * True iff `sequence` holds every integer of `0..length-1` exactly once.
 */
export function isCompleteIndex(sequence: readonly unknown[]): boolean {
  const seen = new Array<boolean>(sequence.length).fill(false);
  for (const value of sequence) {
    if (
      typeof value !== "number" || !Number.isInteger(value) || value < 0 ||
      value >= sequence.length || seen[value]
    ) {
      return false;
    }
    seen[value] = true;
  }
  return true;
}
