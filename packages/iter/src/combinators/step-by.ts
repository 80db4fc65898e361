import type { Option } from "@iterum/option";
import { rejectArgument } from "../errors.js";
import { nthOf } from "../protocol.js";
import type { Sequence } from "../protocol.js";

/** The first element, then every `step`-th one after it. */
export class StepBy<T> implements Sequence<T> {
  private first = true;

  constructor(
    private readonly source: Sequence<T>,
    private readonly step: number
  ) {
    if (!Number.isSafeInteger(step) || step < 1) {
      rejectArgument("stepBy", "step", step, "expected a positive safe integer");
    }
  }

  next(): Option<T> {
    if (this.first) {
      this.first = false;
      return this.source.next();
    }
    return nthOf(this.source, this.step - 1);
  }
}
