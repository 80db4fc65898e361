import type { Option } from "@iterum/option";
import { nthOf } from "../protocol.js";
import type { Sequence } from "../protocol.js";

/** Discards the first `n` elements, in a single `nth` call at the first pull. */
export class Skip<T> implements Sequence<T> {
  constructor(
    private readonly source: Sequence<T>,
    private pending: number
  ) {}

  next(): Option<T> {
    if (this.pending > 0) {
      const n = this.pending;
      this.pending = 0;
      return nthOf(this.source, n);
    }
    return this.source.next();
  }
}

/** Discards elements while `predicate` holds; after the first failure it is not called again. */
export class SkipWhile<T> implements Sequence<T> {
  private skipping = true;

  constructor(
    private readonly source: Sequence<T>,
    private readonly predicate: (value: T) => unknown
  ) {}

  next(): Option<T> {
    if (!this.skipping) return this.source.next();
    for (;;) {
      const item = this.source.next();
      if (item.isNil()) return item;
      if (!this.predicate(item.value)) {
        this.skipping = false;
        return item;
      }
    }
  }
}
