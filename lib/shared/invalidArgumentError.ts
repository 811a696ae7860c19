/**
 * Invalid argument error definitions.
 *
 * This module defines the error raised whenever a caller breaks the contract
 * of a tree or permutation operation.
 *
 * @module
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}
