import { nil } from "@iterum/option";
import type { Option } from "@iterum/option";
import type { Sequence } from "../protocol.js";

/**
 * Sequence whose elements come from calling `fn`; the first `Nil` ends it
 * and `fn` is not called again.
 */
export class FromFn<T> implements Sequence<T> {
  private done = false;

  constructor(private readonly fn: () => Option<T>) {}

  next(): Option<T> {
    if (this.done) return nil;
    const item = this.fn();
    if (item.isNil()) this.done = true;
    return item;
  }
}
