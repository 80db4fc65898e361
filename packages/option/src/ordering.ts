/**
 * Ordering and total comparison.
 *
 * Laws for an `Ord<A>`:
 *   - Antisymmetry: compare(x, y) <= 0 && compare(y, x) <= 0 => x equals y
 *   - Transitivity: compare(x, y) <= 0 && compare(y, z) <= 0 => compare(x, z) <= 0
 *   - Totality: compare(x, y) <= 0 || compare(y, x) <= 0
 */

/**
 * Result of a comparison
 */
export type Ordering = -1 | 0 | 1;

export const LT: Ordering = -1;
export const EQ: Ordering = 0;
export const GT: Ordering = 1;

/**
 * Ord typeclass - total ordering over A
 */
export interface Ord<A> {
  readonly compare: (x: A, y: A) => Ordering;
}

/** Values the native relational operators order meaningfully. */
export type Comparable = number | string | bigint | boolean | Date;

/**
 * The natural order of primitives and dates, via `===`, `<` and `>`, or
 * `undefined` when none of the three hold. That happens for `NaN`, for
 * objects, and for values of different kinds (`1` against `"1"`).
 */
export function partialCompare(a: unknown, b: unknown): Ordering | undefined {
  if (a === b) return EQ;
  if (a instanceof Date && b instanceof Date) {
    return partialCompare(a.getTime(), b.getTime());
  }
  if (typeof a === "number" && typeof b === "number") return relate(a < b, a > b);
  if (typeof a === "string" && typeof b === "string") return relate(a < b, a > b);
  if (typeof a === "bigint" && typeof b === "bigint") return relate(a < b, a > b);
  if (typeof a === "boolean" && typeof b === "boolean") return a ? GT : LT;
  return undefined;
}

function relate(less: boolean, greater: boolean): Ordering | undefined {
  if (less) return LT;
  if (greater) return GT;
  return undefined;
}

/**
 * `partialCompare` as a total order: throws a `TypeError` where it has no
 * answer.
 */
export function naturalOrder(a: unknown, b: unknown): Ordering {
  const ordering = partialCompare(a, b);
  if (ordering === undefined) {
    throw new TypeError(`Cannot compare ${describe(a)} with ${describe(b)}`);
  }
  return ordering;
}

/** `naturalOrder`, restricted to values of one comparable type. */
export function compareValues<A extends Comparable>(a: A, b: A): Ordering {
  return naturalOrder(a, b);
}

export function reverseOrdering(ordering: Ordering): Ordering {
  return ordering === LT ? GT : ordering === GT ? LT : EQ;
}

export const ordComparable: Ord<Comparable> = {
  compare: compareValues,
};

function describe(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (value instanceof Date) return `Date ${value.getTime()}`;
  return `${typeof value} ${String(value)}`;
}
