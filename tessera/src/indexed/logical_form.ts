import { List } from "immutable";

import { PADDING_INDEX } from "../data_indexer.js";
import { padSequence } from "../processing/text.js";
import { type PaddingLengths, requireLength } from "./padding.js";

/**
 * Operations of the stack machine encoding a tree.
 *
 * Shift pushes the next element, Reduce2 and Reduce3 combine the top two or
 * three items of the stack. Padding fills transition sequences and is never
 * produced by a tree.
 */
export const Transition = {
  Padding: 0,
  Shift: 1,
  Reduce2: 2,
  Reduce3: 3,
} as const;
export type Transition = (typeof Transition)[keyof typeof Transition];

/** A logical form as element indices plus the transitions rebuilding its tree */
export class IndexedLogicalFormInstance {
  readonly kind = "logical-form";

  constructor(
    readonly wordIndices: List<number>,
    readonly transitions: List<Transition>,
    readonly label: boolean | undefined,
    readonly index?: number,
  ) {}

  getPaddingLengths(): PaddingLengths {
    return {
      num_sentence_words: this.wordIndices.size,
      num_transitions: this.transitions.size,
    };
  }

  pad(lengths: PaddingLengths): IndexedLogicalFormInstance {
    return new IndexedLogicalFormInstance(
      padSequence(
        this.wordIndices,
        requireLength(lengths, "num_sentence_words"),
        PADDING_INDEX,
      ),
      padSequence<Transition>(
        this.transitions,
        requireLength(lengths, "num_transitions"),
        Transition.Padding,
      ),
      this.label,
      this.index,
    );
  }

  blank(): IndexedLogicalFormInstance {
    return new IndexedLogicalFormInstance(List(), List(), false);
  }
}
