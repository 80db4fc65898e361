import { nil } from "@iterum/option";
import type { Option } from "@iterum/option";
import type { Sequence } from "../protocol.js";
import { IterableSequence } from "../sources/iterable.js";

/**
 * Maps each element to an iterable and yields its contents. The current
 * inner iterable is drained before the outer sequence is pulled again.
 */
export class FlatMap<T, U> implements Sequence<U> {
  private inner: Sequence<U> | undefined;

  constructor(
    private readonly source: Sequence<T>,
    private readonly fn: (value: T) => Iterable<U>
  ) {}

  next(): Option<U> {
    for (;;) {
      if (this.inner) {
        const item = this.inner.next();
        if (item.isSome()) return item;
        this.inner = undefined;
      }
      const outer = this.source.next();
      if (outer.isNil()) return nil;
      this.inner = new IterableSequence(this.fn(outer.value));
    }
  }
}

export class Flatten<T> extends FlatMap<Iterable<T>, T> {
  constructor(source: Sequence<Iterable<T>>) {
    super(source, (inner) => inner);
  }
}
