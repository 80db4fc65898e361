import { nil } from "@iterum/option";
import type { Option } from "@iterum/option";
import type { Sequence } from "../protocol.js";

/** Mutable cell handed to a `scan` callback. */
export interface State<S> {
  value: S;
}

/**
 * Threads `state` through `fn`, yielding what `fn` returns. The first `Nil`
 * from `fn` ends the sequence.
 */
export class Scan<T, S, U> implements Sequence<U> {
  private readonly state: State<S>;
  private done = false;

  constructor(
    private readonly source: Sequence<T>,
    seed: S,
    private readonly fn: (state: State<S>, value: T) => Option<U>
  ) {
    this.state = { value: seed };
  }

  next(): Option<U> {
    if (this.done) return nil;
    const item = this.source.next();
    if (item.isNil()) return nil;
    const out = this.fn(this.state, item.value);
    if (out.isNil()) this.done = true;
    return out;
  }
}

/** Like `filterMap`, except that the first `Nil` from `fn` ends the sequence. */
export class MapWhile<T, U> implements Sequence<U> {
  private done = false;

  constructor(
    private readonly source: Sequence<T>,
    private readonly fn: (value: T) => Option<U>
  ) {}

  next(): Option<U> {
    if (this.done) return nil;
    const item = this.source.next();
    if (item.isNil()) return nil;
    const out = this.fn(item.value);
    if (out.isNil()) this.done = true;
    return out;
  }
}
