import { Some, nil } from "@iterum/option";
import type { Option } from "@iterum/option";
import type { ExactSizeSequence } from "../protocol.js";

/**
 * Double-ended, sized view over anything indexable: arrays, strings, typed
 * arrays. Elements are read by index at each pull, never copied.
 */
export class ArraySequence<T> implements ExactSizeSequence<T> {
  private front = 0;
  private back: number;

  constructor(private readonly items: ArrayLike<T>) {
    this.back = items.length;
  }

  next(): Option<T> {
    return this.front < this.back ? Some(this.items[this.front++]) : nil;
  }

  nextBack(): Option<T> {
    return this.front < this.back ? Some(this.items[--this.back]) : nil;
  }

  nth(n: number): Option<T> {
    if (n >= this.len()) {
      this.front = this.back;
      return nil;
    }
    this.front += n;
    return this.next();
  }

  nthBack(n: number): Option<T> {
    if (n >= this.len()) {
      this.back = this.front;
      return nil;
    }
    this.back -= n;
    return this.nextBack();
  }

  len(): number {
    return this.back - this.front;
  }
}
