import { createLogger } from "@iterum/core";
import { nil } from "@iterum/option";
import type { Option } from "@iterum/option";
import type { DoubleEndedSequence, ExactSizeSequence, Sequence } from "../protocol.js";

const log = createLogger("fuse");

/** Once the source answers `Nil` from either end, `Nil` forever without pulling it again. */
export class Fuse<T, S extends Sequence<T> = Sequence<T>> implements Sequence<T> {
  private done = false;

  constructor(private readonly source: S) {}

  next(): Option<T> {
    if (this.done) return nil;
    return this.trip(this.source.next());
  }

  nextBack(this: Fuse<T, DoubleEndedSequence<T>>): Option<T> {
    if (this.done) return nil;
    return this.trip(this.source.nextBack());
  }

  len(this: Fuse<T, ExactSizeSequence<T>>): number {
    return this.done ? 0 : this.source.len();
  }

  private trip(item: Option<T>): Option<T> {
    if (item.isNil()) {
      log.debug("source exhausted, fuse tripped");
      this.done = true;
    }
    return item;
  }
}
