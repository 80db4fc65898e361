/**
 * Forward-only fluent wrapper over a {@link Sequence}.
 *
 * Chained calls (`map`, `filter`, `zip`, ...) wrap the current sequence in a
 * combinator and return a new wrapper without pulling anything. Terminal
 * operations (`collect`, `fold`, `find`, ...) pull until they have an answer.
 *
 * @example
 * ```typescript
 * iterum([1, 2, 3, 4, 5])
 *   .filter((x) => x % 2 === 1)
 *   .map((x) => x * 10)
 *   .collect(); // [10, 30, 50]
 * ```
 */

import { EQ, GT, LT, Some, fromNullable, naturalOrder, nil, partialCompare } from "@iterum/option";
import type { Option, Ordering } from "@iterum/option";
import * as seq from "./combinators/index.js";
import type { State } from "./combinators/index.js";
import { requireCount } from "./errors.js";
import { nthOf } from "./protocol.js";
import type { Sequence } from "./protocol.js";
import { ArraySequence } from "./sources/array.js";
import { IterableSequence } from "./sources/iterable.js";

/**
 * The sequence behind `source`: wrappers are used as they are, arrays are
 * read by index, and any other iterable through its iterator.
 */
export function toSequence<T>(source: Iterable<T>): Sequence<T> {
  if (source instanceof Iterum) return source;
  if (Array.isArray(source)) return new ArraySequence(source);
  return new IterableSequence(source);
}

export class Iterum<T, S extends Sequence<T> = Sequence<T>> implements Sequence<T>, Iterable<T> {
  constructor(protected readonly source: S) {}

  next(): Option<T> {
    return this.source.next();
  }

  *[Symbol.iterator](): Iterator<T> {
    for (;;) {
      const item = this.source.next();
      if (item.isNil()) return;
      yield item.value;
    }
  }

  // ---------------------------------------------------------------------------
  // Combinators
  // ---------------------------------------------------------------------------

  map<U>(fn: (value: T) => U): Iterum<U> {
    return new Iterum<U>(new seq.Map<T, U>(this.source, fn));
  }

  filter(predicate: (value: T) => unknown): Iterum<T> {
    return new Iterum<T>(new seq.Filter<T>(this.source, predicate));
  }

  filterMap<U>(fn: (value: T) => Option<U>): Iterum<U> {
    return new Iterum<U>(new seq.FilterMap<T, U>(this.source, fn));
  }

  flatMap<U>(fn: (value: T) => Iterable<U>): Iterum<U> {
    return new Iterum<U>(new seq.FlatMap<T, U>(this.source, fn));
  }

  flatten<U>(this: Iterum<Iterable<U>>): Iterum<U> {
    return new Iterum<U>(new seq.Flatten<U>(this.source));
  }

  chain(other: Iterable<T>): Iterum<T> {
    return new Iterum<T>(new seq.Chain<T>(this.source, toSequence(other)));
  }

  zip<U>(other: Iterable<U>): Iterum<[T, U]> {
    return new Iterum<[T, U]>(new seq.Zip<T, U>(this.source, toSequence(other)));
  }

  enumerate(): Iterum<[number, T]> {
    return new Iterum<[number, T]>(new seq.Enumerate<T>(this.source));
  }

  take(n: number): Iterum<T> {
    requireCount("take", "n", n);
    return new Iterum<T>(new seq.Take<T>(this.source, n));
  }

  takeWhile(predicate: (value: T) => unknown): Iterum<T> {
    return new Iterum<T>(new seq.TakeWhile<T>(this.source, predicate));
  }

  skip(n: number): Iterum<T> {
    requireCount("skip", "n", n);
    return new Iterum<T>(new seq.Skip<T>(this.source, n));
  }

  skipWhile(predicate: (value: T) => unknown): Iterum<T> {
    return new Iterum<T>(new seq.SkipWhile<T>(this.source, predicate));
  }

  /**
   * The first element, then every `step`-th one.
   *
   * @throws InvalidArgumentError unless `step` is a positive safe integer
   */
  stepBy(step: number): Iterum<T> {
    return new Iterum<T>(new seq.StepBy<T>(this.source, step));
  }

  scan<St, U>(seed: St, fn: (state: State<St>, value: T) => Option<U>): Iterum<U> {
    return new Iterum<U>(new seq.Scan<T, St, U>(this.source, seed, fn));
  }

  mapWhile<U>(fn: (value: T) => Option<U>): Iterum<U> {
    return new Iterum<U>(new seq.MapWhile<T, U>(this.source, fn));
  }

  peekable(): PeekableIterum<T> {
    return new PeekableIterum<T>(new seq.Peekable<T>(this.source));
  }

  fuse(): Iterum<T> {
    return new Iterum<T>(new seq.Fuse<T>(this.source));
  }

  cycle(): Iterum<T> {
    return new Iterum<T>(new seq.Cycle<T>(this.source));
  }

  inspect(fn: (value: T) => void): Iterum<T> {
    return new Iterum<T>(new seq.Inspect<T>(this.source, fn));
  }

  // ---------------------------------------------------------------------------
  // Terminal operations
  // ---------------------------------------------------------------------------

  fold<A>(seed: A, fn: (acc: A, value: T) => A): A {
    let acc = seed;
    for (;;) {
      const item = this.source.next();
      if (item.isNil()) return acc;
      acc = fn(acc, item.value);
    }
  }

  /** Like `fold`, but the first `Nil` from `fn` stops the fold and is returned. */
  tryFold<A>(seed: A, fn: (acc: A, value: T) => Option<A>): Option<A> {
    let acc = seed;
    for (;;) {
      const item = this.source.next();
      if (item.isNil()) return Some(acc);
      const result = fn(acc, item.value);
      if (result.isNil()) return nil;
      acc = result.value;
    }
  }

  /** `fold` seeded with the first element; `Nil` when there is none. */
  reduce(fn: (acc: T, value: T) => T): Option<T> {
    const first = this.source.next();
    return first.isSome() ? Some(this.fold(first.value, fn)) : nil;
  }

  forEach(fn: (value: T) => void): void {
    for (;;) {
      const item = this.source.next();
      if (item.isNil()) return;
      fn(item.value);
    }
  }

  /**
   * The remaining elements as an array, or handed to `into` as an iterable.
   *
   * @example
   * ```typescript
   * iterum("hello").collect((chars) => new Set(chars)); // Set { "h", "e", "l", "o" }
   * ```
   */
  collect(): T[];
  collect<C>(into: (items: Iterable<T>) => C): C;
  collect<C>(into?: (items: Iterable<T>) => C): T[] | C {
    if (into) return into(this);
    return this.fold<T[]>([], (items, value) => {
      items.push(value);
      return items;
    });
  }

  count(): number {
    return this.fold(0, (n) => n + 1);
  }

  last(): Option<T> {
    return this.fold<Option<T>>(nil, (_, value) => Some(value));
  }

  /**
   * The element `n` positions ahead: `nth(0)` is `next()`. `Nil` when fewer
   * than `n + 1` remain.
   */
  nth(n: number): Option<T> {
    requireCount("nth", "n", n);
    return nthOf(this.source, n);
  }

  /** Stops at the first element failing `predicate`. */
  all(predicate: (value: T) => unknown): boolean {
    for (;;) {
      const item = this.source.next();
      if (item.isNil()) return true;
      if (!predicate(item.value)) return false;
    }
  }

  /** Stops at the first element satisfying `predicate`. */
  any(predicate: (value: T) => unknown): boolean {
    return this.find(predicate).isSome();
  }

  find(predicate: (value: T) => unknown): Option<T> {
    for (;;) {
      const item = this.source.next();
      if (item.isNil() || predicate(item.value)) return item;
    }
  }

  findMap<U>(fn: (value: T) => Option<U>): Option<U> {
    for (;;) {
      const item = this.source.next();
      if (item.isNil()) return nil;
      const mapped = fn(item.value);
      if (mapped.isSome()) return mapped;
    }
  }

  position(predicate: (value: T) => unknown): Option<number> {
    for (let index = 0; ; index++) {
      const item = this.source.next();
      if (item.isNil()) return nil;
      if (predicate(item.value)) return Some(index);
    }
  }

  /** `[matching, rest]`, each in pull order. */
  partition(predicate: (value: T) => unknown): [T[], T[]] {
    const matching: T[] = [];
    const rest: T[] = [];
    this.forEach((value) => (predicate(value) ? matching : rest).push(value));
    return [matching, rest];
  }

  unzip<A, B>(this: Iterum<readonly [A, B]>): [A[], B[]] {
    const left: A[] = [];
    const right: B[] = [];
    this.forEach(([a, b]) => {
      left.push(a);
      right.push(b);
    });
    return [left, right];
  }

  /**
   * The greatest element by natural order; the last one among equals.
   *
   * @throws TypeError when two elements are not comparable
   */
  max(): Option<T> {
    return this.maxBy(naturalOrder);
  }

  /** The least element by natural order; the first one among equals. */
  min(): Option<T> {
    return this.minBy(naturalOrder);
  }

  maxBy(compare: (a: T, b: T) => Ordering): Option<T> {
    return this.reduce((best, value) => (compare(value, best) === LT ? best : value));
  }

  minBy(compare: (a: T, b: T) => Ordering): Option<T> {
    return this.reduce((best, value) => (compare(value, best) === LT ? value : best));
  }

  maxByKey<K>(key: (value: T) => K): Option<T> {
    return this.map((value): [K, T] => [key(value), value])
      .maxBy(([a], [b]) => naturalOrder(a, b))
      .map(([, value]) => value);
  }

  minByKey<K>(key: (value: T) => K): Option<T> {
    return this.map((value): [K, T] => [key(value), value])
      .minBy(([a], [b]) => naturalOrder(a, b))
      .map(([, value]) => value);
  }

  /** `Nil` when empty. */
  sum(this: Iterum<number>): Option<number> {
    return this.reduce((a, b) => a + b);
  }

  /** `Nil` when empty. */
  product(this: Iterum<number>): Option<number> {
    return this.reduce((a, b) => a * b);
  }

  join(this: Iterum<string>, separator: string = ""): string {
    return this.reduce((acc, value) => acc + separator + value).unwrapOr("");
  }

  // ---------------------------------------------------------------------------
  // Comparison against another iterable
  // ---------------------------------------------------------------------------

  /**
   * Lexicographic comparison, element by element. A strict prefix orders
   * first.
   */
  cmpBy<U>(other: Iterable<U>, compare: (a: T, b: U) => Ordering): Ordering {
    return this.partialCmpBy(other, (a, b) => Some(compare(a, b))).unwrap();
  }

  /** @throws TypeError when two elements are not comparable */
  cmp(other: Iterable<T>): Ordering {
    return this.cmpBy(other, naturalOrder);
  }

  /** Like `cmpBy`, answering `Nil` as soon as `compare` does. */
  partialCmpBy<U>(other: Iterable<U>, compare: (a: T, b: U) => Option<Ordering>): Option<Ordering> {
    const right = toSequence(other);
    for (;;) {
      const a = this.source.next();
      if (a.isNil()) return Some(right.next().isNil() ? EQ : LT);
      const b = right.next();
      if (b.isNil()) return Some(GT);
      const ordering = compare(a.value, b.value);
      if (ordering.isNil() || ordering.value !== EQ) return ordering;
    }
  }

  /** Lexicographic comparison; `Nil` when two elements are not comparable. */
  partialCmp(other: Iterable<T>): Option<Ordering> {
    return this.partialCmpBy(other, (a, b) => fromNullable(partialCompare(a, b)));
  }

  eqBy<U>(other: Iterable<U>, equals: (a: T, b: U) => boolean): boolean {
    return this.partialCmpBy(other, (a, b) => (equals(a, b) ? Some(EQ) : nil)).isSomeAnd(
      (ordering) => ordering === EQ
    );
  }

  /** Same length and pairwise `===`. */
  eq(other: Iterable<T>): boolean {
    return this.eqBy(other, (a, b) => a === b);
  }

  ne(other: Iterable<T>): boolean {
    return !this.eq(other);
  }

  lt(other: Iterable<T>): boolean {
    return this.partialCmp(other).isSomeAnd((ordering) => ordering === LT);
  }

  le(other: Iterable<T>): boolean {
    return this.partialCmp(other).isSomeAnd((ordering) => ordering !== GT);
  }

  gt(other: Iterable<T>): boolean {
    return this.partialCmp(other).isSomeAnd((ordering) => ordering === GT);
  }

  ge(other: Iterable<T>): boolean {
    return this.partialCmp(other).isSomeAnd((ordering) => ordering !== LT);
  }
}

/**
 * An `Iterum` with one element of look-ahead.
 */
export class PeekableIterum<T> extends Iterum<T, seq.Peekable<T>> {
  peek(): Option<T> {
    return this.source.peek();
  }

  nextIf(predicate: (value: T) => unknown): Option<T> {
    return this.source.nextIf(predicate);
  }
}
