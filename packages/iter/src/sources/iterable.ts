import { Some, nil } from "@iterum/option";
import type { Option } from "@iterum/option";
import type { Sequence } from "../protocol.js";

/**
 * Forward sequence over a native iterable. The iterator is requested at the
 * first pull, and is not pulled again once it reports `done`.
 */
export class IterableSequence<T> implements Sequence<T> {
  private iterator: Iterator<T> | undefined;
  private done = false;

  constructor(private readonly source: Iterable<T>) {}

  next(): Option<T> {
    if (this.done) return nil;
    this.iterator ??= this.source[Symbol.iterator]();
    const result = this.iterator.next();
    if (result.done) {
      this.done = true;
      return nil;
    }
    return Some(result.value);
  }
}
