/**
 * @iterum/iter - lazy sequences with Option-returning pulls
 */

// Entry points
export { iterum, diterum, fromFn, range, rangeFrom, iterate, repeat, generate, once, empty } from "./entry.js";

// Wrappers
export { Iterum, PeekableIterum } from "./iterum.js";
export { Diterum, PeekableDiterum, SizedDiterum } from "./diterum.js";

// Protocols
export { nthOf, nthBackOf } from "./protocol.js";
export type { Sequence, DoubleEndedSequence, ExactSizeSequence } from "./protocol.js";

// Sources
export { ArraySequence } from "./sources/array.js";
export { IterableSequence } from "./sources/iterable.js";
export { FromFn } from "./sources/from-fn.js";
export { Range, RangeFrom } from "./sources/range.js";

// Combinator classes, for building sequences without the wrappers
export * as combinators from "./combinators/index.js";
export type { State } from "./combinators/index.js";

// Errors
export { InvalidArgumentError } from "./errors.js";
