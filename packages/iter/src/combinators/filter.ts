import type { Option } from "@iterum/option";
import type { DoubleEndedSequence, Sequence } from "../protocol.js";

export class Filter<T, S extends Sequence<T> = Sequence<T>> implements Sequence<T> {
  constructor(
    private readonly source: S,
    private readonly predicate: (value: T) => unknown
  ) {}

  next(): Option<T> {
    for (;;) {
      const item = this.source.next();
      if (item.isNil() || this.predicate(item.value)) return item;
    }
  }

  nextBack(this: Filter<T, DoubleEndedSequence<T>>): Option<T> {
    for (;;) {
      const item = this.source.nextBack();
      if (item.isNil() || this.predicate(item.value)) return item;
    }
  }
}
