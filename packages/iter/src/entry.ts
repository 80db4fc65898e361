/**
 * Entry points for creating sequences.
 *
 * `iterum()` wraps an array or any iterable; `range()` and `rangeFrom()`
 * count; `iterate()`, `repeat()` and `generate()` build infinite sources.
 */

import { Some } from "@iterum/option";
import type { Option } from "@iterum/option";
import { SizedDiterum } from "./diterum.js";
import { Iterum } from "./iterum.js";
import { ArraySequence } from "./sources/array.js";
import { FromFn } from "./sources/from-fn.js";
import { IterableSequence } from "./sources/iterable.js";
import { Range, RangeFrom } from "./sources/range.js";

/**
 * Wrap a collection or iterable. Arrays become double-ended and sized; any
 * other iterable is forward-only; a wrapper is returned as it is.
 */
export function iterum<T>(source: readonly T[]): SizedDiterum<T>;
export function iterum<W extends Iterum<unknown>>(source: W): W;
export function iterum<T>(source: Iterable<T>): Iterum<T>;
export function iterum<T>(source: Iterable<T>): Iterum<T> {
  if (source instanceof Iterum) return source;
  if (Array.isArray(source)) return new SizedDiterum<T>(new ArraySequence(source));
  return new Iterum<T>(new IterableSequence(source));
}

/** Double-ended, sized view over anything indexable: arrays, strings, typed arrays. */
export function diterum<T>(source: ArrayLike<T>): SizedDiterum<T> {
  return new SizedDiterum<T>(new ArraySequence(source));
}

/** Elements produced by `fn` until it first returns `Nil`. */
export function fromFn<T>(fn: () => Option<T>): Iterum<T> {
  return new Iterum<T>(new FromFn(fn));
}

/**
 * Integers from `start` (default 0) up to, not including, `end`, `step`
 * apart. A negative `step` counts down.
 *
 * @throws InvalidArgumentError when an argument is not a safe integer or `step` is 0
 *
 * @example
 * ```typescript
 * range(3).collect();          // [0, 1, 2]
 * range(3, 9, 3).collect();    // [3, 6]
 * range(5, 0, -2).collect();   // [5, 3, 1]
 * ```
 */
export function range(end: number): SizedDiterum<number>;
export function range(start: number, end: number, step?: number): SizedDiterum<number>;
export function range(startOrEnd: number, end?: number, step: number = 1): SizedDiterum<number> {
  const sequence =
    end === undefined ? new Range(0, startOrEnd, step) : new Range(startOrEnd, end, step);
  return new SizedDiterum<number>(sequence);
}

/** Integers from `start`, `step` apart, without end. */
export function rangeFrom(start: number = 0, step: number = 1): Iterum<number> {
  return new Iterum<number>(new RangeFrom(start, step));
}

/** `seed`, `fn(seed)`, `fn(fn(seed))`, ... `fn` runs only when the next value is pulled. */
export function iterate<T>(seed: T, fn: (value: T) => T): Iterum<T> {
  let current = seed;
  let started = false;
  return fromFn(() => {
    if (started) current = fn(current);
    started = true;
    return Some(current);
  });
}

export function repeat<T>(value: T): Iterum<T> {
  return fromFn(() => Some(value));
}

/** Infinite sequence of `fn()` results. */
export function generate<T>(fn: () => T): Iterum<T> {
  return fromFn(() => Some(fn()));
}

export function once<T>(value: T): SizedDiterum<T> {
  return diterum([value]);
}

export function empty<T>(): SizedDiterum<T> {
  return diterum<T>([]);
}
