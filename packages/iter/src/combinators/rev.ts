import type { Option } from "@iterum/option";
import { nthBackOf, nthOf } from "../protocol.js";
import type { DoubleEndedSequence, ExactSizeSequence } from "../protocol.js";

export class Rev<T, S extends DoubleEndedSequence<T> = DoubleEndedSequence<T>>
  implements DoubleEndedSequence<T>
{
  constructor(private readonly source: S) {}

  next(): Option<T> {
    return this.source.nextBack();
  }

  nextBack(): Option<T> {
    return this.source.next();
  }

  nth(n: number): Option<T> {
    return nthBackOf(this.source, n);
  }

  nthBack(n: number): Option<T> {
    return nthOf(this.source, n);
  }

  len(this: Rev<T, ExactSizeSequence<T>>): number {
    return this.source.len();
  }
}
