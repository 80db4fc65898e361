/**
 * Sequence protocols
 *
 * A sequence is pulled one element at a time with `next()`, which answers
 * `Some(value)` or, once exhausted, `Nil` on every later call. Double-ended
 * sequences can also be pulled from the back; both cursors converge and no
 * element is produced twice.
 */

import { nil } from "@iterum/option";
import type { Option } from "@iterum/option";

export interface Sequence<T> {
  next(): Option<T>;
  /**
   * Optional fast path with the result of discarding `n` elements and then
   * pulling one.
   */
  nth?(n: number): Option<T>;
}

export interface DoubleEndedSequence<T> extends Sequence<T> {
  nextBack(): Option<T>;
  nthBack?(n: number): Option<T>;
}

/** A double-ended sequence that knows how many elements remain. */
export interface ExactSizeSequence<T> extends DoubleEndedSequence<T> {
  len(): number;
}

/**
 * Discard `n` elements and pull one, through `source.nth` when present.
 */
export function nthOf<T>(source: Sequence<T>, n: number): Option<T> {
  if (source.nth) return source.nth(n);
  for (let i = 0; i < n; i++) {
    if (source.next().isNil()) return nil;
  }
  return source.next();
}

export function nthBackOf<T>(source: DoubleEndedSequence<T>, n: number): Option<T> {
  if (source.nthBack) return source.nthBack(n);
  for (let i = 0; i < n; i++) {
    if (source.nextBack().isNil()) return nil;
  }
  return source.nextBack();
}
