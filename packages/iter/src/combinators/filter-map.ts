import { nil } from "@iterum/option";
import type { Option } from "@iterum/option";
import type { DoubleEndedSequence, Sequence } from "../protocol.js";

/** Filter and map in one step: elements for which `fn` answers `Nil` are dropped. */
export class FilterMap<T, U, S extends Sequence<T> = Sequence<T>> implements Sequence<U> {
  constructor(
    private readonly source: S,
    private readonly fn: (value: T) => Option<U>
  ) {}

  next(): Option<U> {
    for (;;) {
      const item = this.source.next();
      if (item.isNil()) return nil;
      const mapped = this.fn(item.value);
      if (mapped.isSome()) return mapped;
    }
  }

  nextBack(this: FilterMap<T, U, DoubleEndedSequence<T>>): Option<U> {
    for (;;) {
      const item = this.source.nextBack();
      if (item.isNil()) return nil;
      const mapped = this.fn(item.value);
      if (mapped.isSome()) return mapped;
    }
  }
}
