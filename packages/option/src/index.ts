/**
 * @iterum/option - the Option algebra and total ordering used by iterum
 */

export { Some, Nil, nil, fromNullable, isOption } from "./option.js";
export type { Option, OptionCases, Swap } from "./option.js";
export { LT, EQ, GT, naturalOrder, partialCompare, compareValues, reverseOrdering, ordComparable } from "./ordering.js";
export type { Ordering, Ord, Comparable } from "./ordering.js";
export { UnwrapNilError, ExpectNilError } from "./errors.js";
