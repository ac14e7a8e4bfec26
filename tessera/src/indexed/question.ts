import { Repeat } from "immutable";
import type { List } from "immutable";

import { PaddingError } from "../errors.js";
import {
  type PaddingLengths,
  maxPaddingLengths,
  requireLength,
} from "./padding.js";
import type { IndexedBackgroundInstance } from "./background.js";
import type { IndexedLogicalFormInstance } from "./logical_form.js";
import type { IndexedTrueFalseInstance } from "./true_false.js";

export type IndexedOption =
  | IndexedTrueFalseInstance
  | IndexedLogicalFormInstance
  | IndexedBackgroundInstance;

/** Indexed answer options, labeled by the position of the correct one */
export class IndexedQuestionInstance {
  readonly kind = "question";
  readonly index?: number;

  constructor(
    readonly options: List<IndexedOption>,
    readonly label: number,
  ) {}

  getPaddingLengths(): PaddingLengths {
    return {
      ...maxPaddingLengths(this.options),
      num_options: this.options.size,
    };
  }

  /**
   * Pad every option to `lengths`.
   * Missing options are blank ones appended after the real options, so that
   * the label still points at the correct answer.
   */
  pad(lengths: PaddingLengths): IndexedQuestionInstance {
    const numOptions = requireLength(lengths, "num_options");
    if (!Number.isInteger(numOptions))
      throw new PaddingError(`num_options should be an integer, got ${numOptions}`);
    if (numOptions < this.options.size)
      throw new PaddingError(
        `can't drop options, got ${this.options.size} but asked for ${numOptions}`,
      );

    const first = this.options.first();
    if (first === undefined)
      throw new PaddingError("can't pad a question without options");

    const filler = Repeat(first.blank(), numOptions - this.options.size);
    return new IndexedQuestionInstance(
      this.options.concat(filler).map((option) => option.pad(lengths)),
      this.label,
    );
  }
}
