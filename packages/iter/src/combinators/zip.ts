import { createLogger } from "@iterum/core";
import { Some, nil } from "@iterum/option";
import type { Option } from "@iterum/option";
import type { ExactSizeSequence, Sequence } from "../protocol.js";

const log = createLogger("zip");

/**
 * Pairs elements of two sequences and stops at the shorter one. Once `left`
 * is exhausted `right` is not pulled.
 *
 * From the back both sides must be sized: the longer one is first trimmed to
 * the length of the shorter, so that pairs match the ones a forward pass
 * would produce.
 */
export class Zip<T, U, A extends Sequence<T> = Sequence<T>, B extends Sequence<U> = Sequence<U>>
  implements Sequence<[T, U]>
{
  constructor(
    private readonly left: A,
    private readonly right: B
  ) {}

  next(): Option<[T, U]> {
    const a = this.left.next();
    if (a.isNil()) return nil;
    const b = this.right.next();
    if (b.isNil()) return nil;
    return Some<[T, U]>([a.value, b.value]);
  }

  nextBack(this: Zip<T, U, ExactSizeSequence<T>, ExactSizeSequence<U>>): Option<[T, U]> {
    const leftLen = this.left.len();
    const rightLen = this.right.len();
    if (leftLen > rightLen) {
      log.debug(`trimmed ${leftLen - rightLen} elements`, { side: "left" });
      for (let i = rightLen; i < leftLen; i++) this.left.nextBack();
    } else if (rightLen > leftLen) {
      log.debug(`trimmed ${rightLen - leftLen} elements`, { side: "right" });
      for (let i = leftLen; i < rightLen; i++) this.right.nextBack();
    }

    const a = this.left.nextBack();
    const b = this.right.nextBack();
    return a.isSome() && b.isSome() ? Some<[T, U]>([a.value, b.value]) : nil;
  }

  len(this: Zip<T, U, ExactSizeSequence<T>, ExactSizeSequence<U>>): number {
    return Math.min(this.left.len(), this.right.len());
  }
}
