import { Some, nil } from "@iterum/option";
import type { Option } from "@iterum/option";
import { rejectArgument, requireSafeInteger } from "../errors.js";
import type { ExactSizeSequence, Sequence } from "../protocol.js";

function requireStep(scope: string, step: number): void {
  requireSafeInteger(scope, "step", step);
  if (step === 0) rejectArgument(scope, "step", step, "step must not be zero");
}

/** Floored modulo: the result takes the sign of `divisor`. */
function floorMod(dividend: number, divisor: number): number {
  return ((dividend % divisor) + divisor) % divisor;
}

/**
 * Arithmetic progression `start, start + step, ...` stopping before `end`.
 *
 * Both cursors are kept as element values: `front` is the next value from
 * the front and `back` the next from the back, so every pull and skip is
 * O(1). The range is empty once `front` has moved past `back` in the
 * direction of `step`.
 */
export class Range implements ExactSizeSequence<number> {
  private front: number;
  private back: number;
  private readonly step: number;

  constructor(start: number, end: number, step: number = 1) {
    requireSafeInteger("range", "start", start);
    requireSafeInteger("range", "end", end);
    requireStep("range", step);
    if (!Number.isSafeInteger(end - start)) {
      rejectArgument("range", "end", end, "distance from start must be a safe integer");
    }

    const rem = floorMod(end - start, step);
    this.front = start;
    this.back = rem !== 0 ? end - rem : end - step;
    this.step = step;
  }

  next(): Option<number> {
    if (this.len() === 0) return nil;
    const value = this.front;
    this.front += this.step;
    return Some(value);
  }

  nextBack(): Option<number> {
    if (this.len() === 0) return nil;
    const value = this.back;
    this.back -= this.step;
    return Some(value);
  }

  nth(n: number): Option<number> {
    if (n >= this.len()) {
      this.front = this.back + this.step;
      return nil;
    }
    this.front += n * this.step;
    return this.next();
  }

  nthBack(n: number): Option<number> {
    if (n >= this.len()) {
      this.back = this.front - this.step;
      return nil;
    }
    this.back -= n * this.step;
    return this.nextBack();
  }

  len(): number {
    const span = this.back - this.front;
    if (Math.sign(this.step) * span < 0) return 0;
    return span / this.step + 1;
  }

  /** Whether `value` is among the elements not yet pulled. */
  contains(value: number): boolean {
    if (this.len() === 0 || !Number.isSafeInteger(value)) return false;
    const direction = Math.sign(this.step);
    return (
      direction * (value - this.front) >= 0 &&
      direction * (this.back - value) >= 0 &&
      (value - this.front) % this.step === 0
    );
  }

  /** Same remaining elements in the same order. */
  equals(other: Range): boolean {
    const length = this.len();
    if (length !== other.len()) return false;
    return length === 0 || (this.front === other.front && this.step === other.step);
  }

  toString(): string {
    return `Range(start=${this.front}, end=${this.back + this.step}, step=${this.step})`;
  }
}

/**
 * Unbounded progression `start, start + step, ...`. Ends with `Nil` once the
 * next value would no longer be a safe integer.
 */
export class RangeFrom implements Sequence<number> {
  private front: number;
  private readonly step: number;

  constructor(start: number = 0, step: number = 1) {
    requireSafeInteger("rangeFrom", "start", start);
    requireStep("rangeFrom", step);
    this.front = start;
    this.step = step;
  }

  next(): Option<number> {
    if (!Number.isSafeInteger(this.front)) return nil;
    const value = this.front;
    this.front += this.step;
    return Some(value);
  }

  nth(n: number): Option<number> {
    this.front += n * this.step;
    return this.next();
  }

  toString(): string {
    return `RangeFrom(start=${this.front}, step=${this.step})`;
  }
}
