import { createLogger } from "@iterum/core";
import { Some, nil } from "@iterum/option";
import type { Option } from "@iterum/option";
import type { Sequence } from "../protocol.js";

const log = createLogger("cycle");

/**
 * Passes the source through once while recording it, then replays the
 * recording forever. A source that was empty on its first pass gives `Nil`.
 */
export class Cycle<T> implements Sequence<T> {
  private readonly buffer: T[] = [];
  private recording = true;
  private index = 0;

  constructor(private readonly source: Sequence<T>) {}

  next(): Option<T> {
    if (this.recording) {
      const item = this.source.next();
      if (item.isSome()) {
        this.buffer.push(item.value);
        return item;
      }
      this.recording = false;
      if (this.buffer.length === 0) log.debug("source was empty on its first pass");
    }

    if (this.buffer.length === 0) return nil;
    const value = this.buffer[this.index];
    this.index = (this.index + 1) % this.buffer.length;
    return Some(value);
  }
}
