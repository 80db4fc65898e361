/**
 * Double-ended and sized wrappers.
 *
 * `Diterum` adds pulls from the back; `SizedDiterum` also knows how many
 * elements remain. Combinators that preserve either capability return the
 * richer wrapper, so `rev()` or `len()` after a combinator that cannot
 * support them is a type error rather than a runtime one.
 */

import { Some, nil } from "@iterum/option";
import type { Option } from "@iterum/option";
import * as seq from "./combinators/index.js";
import { requireCount } from "./errors.js";
import { Iterum, toSequence } from "./iterum.js";
import { nthBackOf } from "./protocol.js";
import type { DoubleEndedSequence, ExactSizeSequence } from "./protocol.js";
import { ArraySequence } from "./sources/array.js";

function toDoubleEnded<T>(other: Iterable<T>): DoubleEndedSequence<T> | undefined {
  if (other instanceof Diterum) return other;
  if (Array.isArray(other)) return new ArraySequence(other);
  return undefined;
}

function toExactSize<T>(other: Iterable<T>): ExactSizeSequence<T> | undefined {
  if (other instanceof SizedDiterum) return other;
  if (Array.isArray(other)) return new ArraySequence(other);
  return undefined;
}

export class Diterum<T, S extends DoubleEndedSequence<T> = DoubleEndedSequence<T>>
  extends Iterum<T, S>
  implements DoubleEndedSequence<T>
{
  nextBack(): Option<T> {
    return this.source.nextBack();
  }

  /** The element `n` positions from the back: `nthBack(0)` is `nextBack()`. */
  nthBack(n: number): Option<T> {
    requireCount("nthBack", "n", n);
    return nthBackOf(this.source, n);
  }

  rev(): Diterum<T> {
    return new Diterum<T>(new seq.Rev<T>(this.source));
  }

  map<U>(fn: (value: T) => U): Diterum<U> {
    return new Diterum<U>(new seq.Map<T, U, DoubleEndedSequence<T>>(this.source, fn));
  }

  filter(predicate: (value: T) => unknown): Diterum<T> {
    return new Diterum<T>(new seq.Filter<T, DoubleEndedSequence<T>>(this.source, predicate));
  }

  filterMap<U>(fn: (value: T) => Option<U>): Diterum<U> {
    return new Diterum<U>(new seq.FilterMap<T, U, DoubleEndedSequence<T>>(this.source, fn));
  }

  /** Double-ended when `other` is too: another `Diterum` or an array. */
  chain(other: Diterum<T> | readonly T[]): Diterum<T>;
  chain(other: Iterable<T>): Iterum<T>;
  chain(other: Iterable<T>): Iterum<T> {
    const back = toDoubleEnded(other);
    if (!back) return new Iterum<T>(new seq.Chain<T>(this.source, toSequence(other)));
    return new Diterum<T>(
      new seq.Chain<T, DoubleEndedSequence<T>, DoubleEndedSequence<T>>(this.source, back)
    );
  }

  peekable(): PeekableDiterum<T> {
    return new PeekableDiterum<T>(new seq.Peekable<T, DoubleEndedSequence<T>>(this.source));
  }

  fuse(): Diterum<T> {
    return new Diterum<T>(new seq.Fuse<T, DoubleEndedSequence<T>>(this.source));
  }

  inspect(fn: (value: T) => void): Diterum<T> {
    return new Diterum<T>(new seq.Inspect<T, DoubleEndedSequence<T>>(this.source, fn));
  }

  // ---------------------------------------------------------------------------
  // Terminal operations from the back
  // ---------------------------------------------------------------------------

  rfold<A>(seed: A, fn: (acc: A, value: T) => A): A {
    let acc = seed;
    for (;;) {
      const item = this.source.nextBack();
      if (item.isNil()) return acc;
      acc = fn(acc, item.value);
    }
  }

  tryRfold<A>(seed: A, fn: (acc: A, value: T) => Option<A>): Option<A> {
    let acc = seed;
    for (;;) {
      const item = this.source.nextBack();
      if (item.isNil()) return Some(acc);
      const result = fn(acc, item.value);
      if (result.isNil()) return nil;
      acc = result.value;
    }
  }

  rfind(predicate: (value: T) => unknown): Option<T> {
    for (;;) {
      const item = this.source.nextBack();
      if (item.isNil() || predicate(item.value)) return item;
    }
  }
}

/**
 * A `Diterum` with one element of look-ahead from the front.
 */
export class PeekableDiterum<T> extends Diterum<T, seq.Peekable<T, DoubleEndedSequence<T>>> {
  peek(): Option<T> {
    return this.source.peek();
  }

  nextIf(predicate: (value: T) => unknown): Option<T> {
    return this.source.nextIf(predicate);
  }
}

export class SizedDiterum<T>
  extends Diterum<T, ExactSizeSequence<T>>
  implements ExactSizeSequence<T>
{
  len(): number {
    return this.source.len();
  }

  isEmpty(): boolean {
    return this.source.len() === 0;
  }

  /**
   * Index, counted from the front, of the last element satisfying
   * `predicate`; searches from the back.
   */
  rposition(predicate: (value: T) => unknown): Option<number> {
    let index = this.source.len();
    for (;;) {
      const item = this.source.nextBack();
      if (item.isNil()) return nil;
      index--;
      if (predicate(item.value)) return Some(index);
    }
  }

  rev(): SizedDiterum<T> {
    return new SizedDiterum<T>(new seq.Rev<T, ExactSizeSequence<T>>(this.source));
  }

  map<U>(fn: (value: T) => U): SizedDiterum<U> {
    return new SizedDiterum<U>(new seq.Map<T, U, ExactSizeSequence<T>>(this.source, fn));
  }

  /** Sized when `other` is too: another `SizedDiterum` or an array. */
  chain(other: SizedDiterum<T> | readonly T[]): SizedDiterum<T>;
  chain(other: Diterum<T>): Diterum<T>;
  chain(other: Iterable<T>): Iterum<T>;
  chain(other: Iterable<T>): Iterum<T> {
    const sized = toExactSize(other);
    if (!sized) return super.chain(other);
    return new SizedDiterum<T>(
      new seq.Chain<T, ExactSizeSequence<T>, ExactSizeSequence<T>>(this.source, sized)
    );
  }

  /**
   * Double-ended and sized when `other` is sized too. Pulls from the back
   * first trim the longer side.
   */
  zip<U>(other: SizedDiterum<U> | readonly U[]): SizedDiterum<[T, U]>;
  zip<U>(other: Iterable<U>): Iterum<[T, U]>;
  zip<U>(other: Iterable<U>): Iterum<[T, U]> {
    const sized = toExactSize(other);
    if (!sized) return super.zip(other);
    return new SizedDiterum<[T, U]>(
      new seq.Zip<T, U, ExactSizeSequence<T>, ExactSizeSequence<U>>(this.source, sized)
    );
  }

  enumerate(): SizedDiterum<[number, T]> {
    return new SizedDiterum<[number, T]>(new seq.Enumerate<T, ExactSizeSequence<T>>(this.source));
  }

  fuse(): SizedDiterum<T> {
    return new SizedDiterum<T>(new seq.Fuse<T, ExactSizeSequence<T>>(this.source));
  }

  inspect(fn: (value: T) => void): SizedDiterum<T> {
    return new SizedDiterum<T>(new seq.Inspect<T, ExactSizeSequence<T>>(this.source, fn));
  }
}
