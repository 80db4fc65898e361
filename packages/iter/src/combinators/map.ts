import type { Option } from "@iterum/option";
import type { DoubleEndedSequence, ExactSizeSequence, Sequence } from "../protocol.js";

/** Applies `fn` to every element, from whichever end it is pulled. */
export class Map<T, U, S extends Sequence<T> = Sequence<T>> implements Sequence<U> {
  constructor(
    private readonly source: S,
    private readonly fn: (value: T) => U
  ) {}

  next(): Option<U> {
    return this.source.next().map(this.fn);
  }

  nextBack(this: Map<T, U, DoubleEndedSequence<T>>): Option<U> {
    return this.source.nextBack().map(this.fn);
  }

  len(this: Map<T, U, ExactSizeSequence<T>>): number {
    return this.source.len();
  }
}
