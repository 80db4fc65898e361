/**
 * Option Error Types
 *
 * Only the unchecked accessors throw; every other Option operation
 * represents absence as `nil`.
 */

/**
 * Thrown by `unwrap()` on `nil`.
 */
export class UnwrapNilError extends Error {
  constructor(message: string = "Attempted to unwrap nil") {
    super(message);
    this.name = "UnwrapNilError";
  }
}

/**
 * Thrown by `expect(message)` on `nil`; carries the caller's message.
 */
export class ExpectNilError extends Error {
  constructor(message: string = "Expected some but option is nil") {
    super(message);
    this.name = "ExpectNilError";
  }
}
