/**
 * Option Data Type
 *
 * Option represents an optional value: every Option<T> is either `Some`,
 * carrying a value of type T, or `Nil`, carrying nothing.
 *
 * Unlike `T | null`, absence stays distinguishable from a present falsy
 * value: `Some(undefined)`, `Some(null)`, `Some(0)` and `Some(false)` are all
 * present.
 *
 * ## Runtime Representation
 *
 * ```typescript
 * Some(42)   // { _tag: "Some", value: 42 }
 * nil        // { _tag: "Nil" }, a single shared instance
 * ```
 *
 * Options are immutable. The accessors that would mutate an option in place
 * (`insert`, `replace`, `take`, `getOrInsert`) instead return a {@link Swap}
 * holding the would-be new option and the value handed back.
 *
 * @example
 * ```typescript
 * Some(2).map((x) => x * 10).unwrapOr(0);   // 20
 * nil.map((x: number) => x * 10).unwrapOr(0); // 0
 *
 * const opt: Option<number> = lookup(key);
 * if (opt.isSome()) {
 *   opt.value; // number
 * }
 * ```
 */

import { ExpectNilError, UnwrapNilError } from "./errors.js";
import { naturalOrder, GT, LT } from "./ordering.js";
import type { Ordering } from "./ordering.js";

// ============================================================================
// Option Type Definition
// ============================================================================

/**
 * Result of the swapping accessors: the option that would replace the
 * original, and the value returned to the caller.
 */
export interface Swap<I, R> {
  readonly inserted: I;
  readonly returned: R;
}

/**
 * Case functions for {@link OptionBase.match}.
 */
export interface OptionCases<T, R> {
  readonly Some: (value: T) => R;
  readonly Nil: () => R;
}

/**
 * Operations shared by both variants. Not exported: every Option is
 * created through `Some()` or is `nil`.
 */
abstract class OptionBase<T> implements Iterable<T> {
  abstract readonly _tag: "Some" | "Nil";

  // --------------------------------------------------------------------------
  // Type Guards
  // --------------------------------------------------------------------------

  isSome(): this is Some<T> {
    return this._tag === "Some";
  }

  isNil(): this is Nil<T> {
    return this._tag === "Nil";
  }

  /** True for `Some` when `predicate` holds for the value. */
  isSomeAnd(predicate: (value: T) => unknown): boolean {
    return this.isSome() && !!predicate(this.value);
  }

  /** True for `Nil`, or for `Some` when `predicate` holds for the value. */
  isNilOr(predicate: (value: T) => unknown): boolean {
    return this.isSome() ? !!predicate(this.value) : true;
  }

  // --------------------------------------------------------------------------
  // Extraction
  // --------------------------------------------------------------------------

  /**
   * The contained value.
   *
   * @throws UnwrapNilError when called on `Nil`
   */
  unwrap(): T {
    if (this.isSome()) return this.value;
    throw new UnwrapNilError();
  }

  /**
   * The contained value.
   *
   * @throws ExpectNilError carrying `message` when called on `Nil`
   */
  expect(message: string): T {
    if (this.isSome()) return this.value;
    throw new ExpectNilError(message);
  }

  unwrapOr(fallback: T): T {
    return this.isSome() ? this.value : fallback;
  }

  unwrapOrElse(fallback: () => T): T {
    return this.isSome() ? this.value : fallback();
  }

  match<R>(cases: OptionCases<T, R>): R {
    return this.isSome() ? cases.Some(this.value) : cases.Nil();
  }

  // --------------------------------------------------------------------------
  // Transformation
  // --------------------------------------------------------------------------

  map<U>(f: (value: T) => U): Option<U> {
    return this.isSome() ? Some(f(this.value)) : nil;
  }

  mapOr<U>(fallback: U, f: (value: T) => U): U {
    return this.isSome() ? f(this.value) : fallback;
  }

  mapOrElse<U>(fallback: () => U, f: (value: T) => U): U {
    return this.isSome() ? f(this.value) : fallback();
  }

  /** Like `map`, but `f` itself returns an Option, which is not nested. */
  andThen<U>(f: (value: T) => Option<U>): Option<U> {
    return this.isSome() ? f(this.value) : nil;
  }

  filter(predicate: (value: T) => unknown): Option<T> {
    return this.isSome() && predicate(this.value) ? this : nil;
  }

  flatten<U>(this: Option<Option<U>>): Option<U> {
    return this.isSome() ? this.value : nil;
  }

  zip<U>(other: Option<U>): Option<[T, U]> {
    return this.isSome() && other.isSome() ? Some<[T, U]>([this.value, other.value]) : nil;
  }

  unzip<A, B>(this: Option<readonly [A, B]>): [Option<A>, Option<B>] {
    return this.isSome() ? [Some(this.value[0]), Some(this.value[1])] : [nil, nil];
  }

  // --------------------------------------------------------------------------
  // Boolean Combinators
  // --------------------------------------------------------------------------

  /** `other` when this is `Some`, otherwise `Nil`. */
  and<U>(other: Option<U>): Option<U> {
    return this.isSome() ? other : nil;
  }

  or(other: Option<T>): Option<T> {
    return this.isSome() ? this : other;
  }

  orElse(f: () => Option<T>): Option<T> {
    return this.isSome() ? this : f();
  }

  /** The one `Some` among the two, or `Nil` when both or neither are. */
  xor(other: Option<T>): Option<T> {
    if (this.isSome()) return other.isNil() ? this : nil;
    return other.isSome() ? other : nil;
  }

  // --------------------------------------------------------------------------
  // Swapping Accessors
  // --------------------------------------------------------------------------

  insert(value: T): Swap<Some<T>, T> {
    return { inserted: Some(value), returned: value };
  }

  getOrInsert(value: T): Swap<Some<T>, T> {
    return this.isSome()
      ? { inserted: this, returned: this.value }
      : { inserted: Some(value), returned: value };
  }

  getOrInsertWith(f: () => T): Swap<Some<T>, T> {
    if (this.isSome()) return { inserted: this, returned: this.value };
    const value = f();
    return { inserted: Some(value), returned: value };
  }

  replace(value: T): Swap<Some<T>, Option<T>> {
    return { inserted: Some(value), returned: this.toOption() };
  }

  take(): Swap<Nil<T>, Option<T>> {
    return { inserted: nil, returned: this.toOption() };
  }

  // --------------------------------------------------------------------------
  // Comparison
  // --------------------------------------------------------------------------

  /** Same variant and, for `Some`, equal values (`===` by default). */
  eq(other: Option<T>, equals: (a: T, b: T) => boolean = (a, b) => a === b): boolean {
    if (this.isSome()) return other.isSome() && equals(this.value, other.value);
    return other.isNil();
  }

  /**
   * `Nil` orders before every `Some`; two `Some`s order by value, with
   * `compare` or the natural order of primitives and dates.
   */
  cmp(other: Option<T>, compare: (a: T, b: T) => Ordering = naturalOrder): Ordering {
    if (this.isSome()) return other.isSome() ? compare(this.value, other.value) : GT;
    return other.isSome() ? LT : 0;
  }

  // --------------------------------------------------------------------------
  // Conversion
  // --------------------------------------------------------------------------

  *[Symbol.iterator](): Iterator<T> {
    if (this.isSome()) yield this.value;
  }

  toString(): string {
    return this.isSome() ? `Some(${formatValue(this.value)})` : "nil";
  }

  private toOption(): Option<T> {
    return this.isSome() ? this : nil;
  }
}

class SomeOption<T> extends OptionBase<T> {
  readonly _tag = "Some" as const;

  constructor(readonly value: T) {
    super();
  }
}

class NilOption<T = never> extends OptionBase<T> {
  readonly _tag = "Nil" as const;
}

/** An Option holding a value. */
export type Some<T> = SomeOption<T>;

/** An Option holding nothing. */
export type Nil<T = never> = NilOption<T>;

export type Option<T> = Some<T> | Nil<T>;

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a Some value
 */
export function Some<T>(value: T): Some<T> {
  return new SomeOption(value);
}

/**
 * The Nil value, shared by every `Option<T>`
 */
export const nil: Nil = new NilOption();

/** Alias of {@link nil}, for symmetry with `Some`. */
export const Nil: Nil = nil;

/**
 * `Nil` for `null` and `undefined`, `Some` for everything else
 */
export function fromNullable<T>(value: T | null | undefined): Option<T> {
  return value === null || value === undefined ? nil : Some(value);
}

export function isOption(value: unknown): value is Option<unknown> {
  return value instanceof OptionBase;
}

function formatValue(value: unknown): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}
