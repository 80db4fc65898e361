import type { Option } from "@iterum/option";
import type { DoubleEndedSequence, ExactSizeSequence, Sequence } from "../protocol.js";

/** Calls `fn` on each element as it passes, from either end. */
export class Inspect<T, S extends Sequence<T> = Sequence<T>> implements Sequence<T> {
  constructor(
    private readonly source: S,
    private readonly fn: (value: T) => void
  ) {}

  next(): Option<T> {
    return this.observe(this.source.next());
  }

  nextBack(this: Inspect<T, DoubleEndedSequence<T>>): Option<T> {
    return this.observe(this.source.nextBack());
  }

  len(this: Inspect<T, ExactSizeSequence<T>>): number {
    return this.source.len();
  }

  private observe(item: Option<T>): Option<T> {
    if (item.isSome()) this.fn(item.value);
    return item;
  }
}
