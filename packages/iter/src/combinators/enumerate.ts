import { Some, nil } from "@iterum/option";
import type { Option } from "@iterum/option";
import type { ExactSizeSequence, Sequence } from "../protocol.js";

/**
 * Pairs each element with its 0-based position from the front. From the
 * back, the position is the front count plus what remains.
 */
export class Enumerate<T, S extends Sequence<T> = Sequence<T>> implements Sequence<[number, T]> {
  private count = 0;

  constructor(private readonly source: S) {}

  next(): Option<[number, T]> {
    const item = this.source.next();
    if (item.isNil()) return nil;
    return Some<[number, T]>([this.count++, item.value]);
  }

  nextBack(this: Enumerate<T, ExactSizeSequence<T>>): Option<[number, T]> {
    const item = this.source.nextBack();
    if (item.isNil()) return nil;
    return Some<[number, T]>([this.count + this.source.len(), item.value]);
  }

  len(this: Enumerate<T, ExactSizeSequence<T>>): number {
    return this.source.len();
  }
}
