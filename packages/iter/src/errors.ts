/**
 * Argument validation for sequence constructors.
 *
 * Bad arguments are rejected when the sequence is built, never at its first
 * pull.
 */

import { createLogger } from "@iterum/core";

/**
 * Thrown when a constructor or terminal operation receives an argument
 * outside its domain (`stepBy(0)`, `range(0, 1.5)`, `take(-1)`).
 */
export class InvalidArgumentError extends RangeError {
  constructor(
    public readonly argument: string,
    public readonly value: unknown,
    reason: string
  ) {
    super(`Invalid ${argument}: ${String(value)} (${reason})`);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Log the rejection under `scope` at debug level, then throw.
 */
export function rejectArgument(
  scope: string,
  argument: string,
  value: unknown,
  reason: string
): never {
  const error = new InvalidArgumentError(argument, value, reason);
  createLogger(scope).debug(error.message);
  throw error;
}

export function requireSafeInteger(scope: string, argument: string, value: number): void {
  if (!Number.isSafeInteger(value)) {
    rejectArgument(scope, argument, value, "expected a safe integer");
  }
}

/** A count or index: a safe integer, zero or more. */
export function requireCount(scope: string, argument: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    rejectArgument(scope, argument, value, "expected a non-negative safe integer");
  }
}
