import { List } from "immutable";

import { PADDING_INDEX } from "../data_indexer.js";
import { padSequence } from "../processing/text.js";
import { type PaddingLengths, requireLength } from "./padding.js";
import type { IndexedLogicalFormInstance } from "./logical_form.js";
import type { IndexedTrueFalseInstance } from "./true_false.js";

export type IndexedSentenceInstance =
  | IndexedTrueFalseInstance
  | IndexedLogicalFormInstance;

/** An indexed instance along with its indexed background sentences */
export class IndexedBackgroundInstance {
  readonly kind = "background";

  constructor(
    readonly instance: IndexedSentenceInstance,
    readonly backgroundIndices: List<List<number>>,
  ) {}

  get label(): boolean | undefined {
    return this.instance.label;
  }

  get index(): number | undefined {
    return this.instance.index;
  }

  /**
   * Lengths of the wrapped instance, plus the count of background sentences
   * and the size of the longest one.
   */
  getPaddingLengths(): PaddingLengths {
    return {
      ...this.instance.getPaddingLengths(),
      num_background_sentences: this.backgroundIndices.size,
      num_background_words:
        this.backgroundIndices.map((sentence) => sentence.size).max() ?? 0,
    };
  }

  pad(lengths: PaddingLengths): IndexedBackgroundInstance {
    const backgroundWords = requireLength(lengths, "num_background_words");

    return new IndexedBackgroundInstance(
      this.instance.pad(lengths),
      padSequence(
        this.backgroundIndices,
        requireLength(lengths, "num_background_sentences"),
        List<number>(),
      ).map((sentence) =>
        padSequence(sentence, backgroundWords, PADDING_INDEX),
      ),
    );
  }

  blank(): IndexedBackgroundInstance {
    return new IndexedBackgroundInstance(this.instance.blank(), List());
  }
}
