import { List } from "immutable";

import { PADDING_INDEX } from "../data_indexer.js";
import { padSequence } from "../processing/text.js";
import { type PaddingLengths, requireLength } from "./padding.js";

/** A sentence turned into word indices */
export class IndexedTrueFalseInstance {
  readonly kind = "true-false";

  constructor(
    readonly wordIndices: List<number>,
    readonly label: boolean | undefined,
    readonly index?: number,
  ) {}

  getPaddingLengths(): PaddingLengths {
    return { num_sentence_words: this.wordIndices.size };
  }

  pad(lengths: PaddingLengths): IndexedTrueFalseInstance {
    return new IndexedTrueFalseInstance(
      padSequence(
        this.wordIndices,
        requireLength(lengths, "num_sentence_words"),
        PADDING_INDEX,
      ),
      this.label,
      this.index,
    );
  }

  /** Same shape without any word, labeled false */
  blank(): IndexedTrueFalseInstance {
    return new IndexedTrueFalseInstance(List(), false);
  }
}
