import { Seq } from "immutable";

import type { DataIndexer } from "../data_indexer.js";
import type { Tokenizer } from "../processing/text.js";

/** Boolean for true/false data, class index for questions, absent when unknown */
export type Label = boolean | number | undefined;

export interface Instance<L extends Label = Label> {
  readonly label: L;
  /** Stable external identifier, typically a line number */
  readonly index?: number;
}

/**
 * Capabilities shared by every instance holding text.
 *
 * `words` feeds vocabulary fitting, `toIndexedInstance` is the only way to
 * turn the instance into numbers.
 */
export interface TextInstanceLike<L extends Label, I> extends Instance<L> {
  readonly tokenizer: Tokenizer | undefined;
  words(): Seq.Indexed<string>;
  toIndexedInstance(indexer: DataIndexer): I;
}

/** Sequence recomputed on every iteration, nothing is kept in between */
export function lazySeq<T>(make: () => Iterable<T>): Seq.Indexed<T> {
  return Seq.Indexed({ [Symbol.iterator]: () => make()[Symbol.iterator]() });
}
