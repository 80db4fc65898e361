import { nil } from "@iterum/option";
import type { Option } from "@iterum/option";
import type { DoubleEndedSequence, ExactSizeSequence, Sequence } from "../protocol.js";

/**
 * `first` to exhaustion, then `second`. From the back the order reverses:
 * `second` is drained before `first`.
 */
export class Chain<T, A extends Sequence<T> = Sequence<T>, B extends Sequence<T> = Sequence<T>>
  implements Sequence<T>
{
  private firstDone = false;
  private secondDone = false;

  constructor(
    private readonly first: A,
    private readonly second: B
  ) {}

  next(): Option<T> {
    if (!this.firstDone) {
      const item = this.first.next();
      if (item.isSome()) return item;
      this.firstDone = true;
    }
    return this.secondDone ? nil : this.second.next();
  }

  nextBack(this: Chain<T, DoubleEndedSequence<T>, DoubleEndedSequence<T>>): Option<T> {
    if (!this.secondDone) {
      const item = this.second.nextBack();
      if (item.isSome()) return item;
      this.secondDone = true;
    }
    return this.firstDone ? nil : this.first.nextBack();
  }

  len(this: Chain<T, ExactSizeSequence<T>, ExactSizeSequence<T>>): number {
    return (this.firstDone ? 0 : this.first.len()) + (this.secondDone ? 0 : this.second.len());
  }
}
