import { nil } from "@iterum/option";
import type { Option } from "@iterum/option";
import type { Sequence } from "../protocol.js";

export class Take<T> implements Sequence<T> {
  constructor(
    private readonly source: Sequence<T>,
    private remaining: number
  ) {}

  next(): Option<T> {
    if (this.remaining <= 0) return nil;
    this.remaining--;
    return this.source.next();
  }
}

/** Yields while `predicate` holds. The first failing element is consumed and ends the sequence. */
export class TakeWhile<T> implements Sequence<T> {
  private done = false;

  constructor(
    private readonly source: Sequence<T>,
    private readonly predicate: (value: T) => unknown
  ) {}

  next(): Option<T> {
    if (this.done) return nil;
    const item = this.source.next();
    if (item.isSome() && this.predicate(item.value)) return item;
    this.done = true;
    return nil;
  }
}
