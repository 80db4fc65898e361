import { Some, nil } from "@iterum/option";
import type { Option } from "@iterum/option";
import type { DoubleEndedSequence, Sequence } from "../protocol.js";

/**
 * One element of look-ahead.
 *
 * `peeked` is `Nil` when nothing is buffered, and `Some(item)` otherwise;
 * `item` may itself be `Nil` when the peek found the source exhausted.
 */
export class Peekable<T, S extends Sequence<T> = Sequence<T>> implements Sequence<T> {
  private peeked: Option<Option<T>> = nil;

  constructor(private readonly source: S) {}

  next(): Option<T> {
    if (this.peeked.isSome()) {
      const item = this.peeked.value;
      this.peeked = nil;
      return item;
    }
    return this.source.next();
  }

  /** The element the next `next()` will return; repeated peeks pull at most once. */
  peek(): Option<T> {
    if (this.peeked.isSome()) return this.peeked.value;
    const item = this.source.next();
    this.peeked = Some(item);
    return item;
  }

  /** Pulls the next element only when it satisfies `predicate`; otherwise it stays buffered. */
  nextIf(predicate: (value: T) => unknown): Option<T> {
    const item = this.next();
    if (item.isSome() && predicate(item.value)) return item;
    this.peeked = Some(item);
    return nil;
  }

  nextBack(this: Peekable<T, DoubleEndedSequence<T>>): Option<T> {
    if (this.peeked.isNil()) return this.source.nextBack();

    const buffered = this.peeked.value;
    if (buffered.isNil()) return nil;
    const item = this.source.nextBack();
    if (item.isSome()) return item;
    this.peeked = nil;
    return buffered;
  }
}
