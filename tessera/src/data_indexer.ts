import createDebug from "debug";
import { List, Map } from "immutable";

import type { TextInstance } from "./instances/index.js";

const debug = createDebug("tessera:data_indexer");

export const PADDING_TOKEN = "@@PADDING@@";
export const OOV_TOKEN = "@@UNKNOWN@@";
export const PADDING_INDEX = 0;
export const OOV_INDEX = 1;

export interface DataIndexerConfig {
  minCount?: number, // default to 1, words seen less often map to the unknown index
  maxWords?: number, // keep only the most frequent words, unbounded if undefined
}

function checkCount(name: string, value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value < 1)
    throw new Error(`${name} should be a positive integer`);
}

/**
 * Bidirectional mapping between words and integer indices.
 *
 * Index 0 is kept for padding and index 1 for every word not seen while fitting.
 * An indexer is immutable: fit it once on the whole dataset, then index with it.
 */
export class DataIndexer {
  readonly #wordToIndex: Map<string, number>;
  readonly #indexToWord: List<string>;

  /** @param words vocabulary in index order, reserved tokens excluded */
  constructor(words: Iterable<string> = []) {
    this.#indexToWord = List.of(PADDING_TOKEN, OOV_TOKEN).concat(
      List(words).filter((w) => w !== PADDING_TOKEN && w !== OOV_TOKEN).toOrderedSet(),
    );
    this.#wordToIndex = Map(this.#indexToWord.toKeyedSeq().flip());
  }

  /**
   * Count words and keep the frequent ones.
   * Most frequent words get the lowest indices, ties are broken alphabetically.
   */
  static fit(words: Iterable<string>, config?: DataIndexerConfig): DataIndexer {
    const minCount = config?.minCount ?? 1;
    const maxWords = config?.maxWords;
    checkCount("minCount", minCount);
    checkCount("maxWords", maxWords);

    const counts = List(words).countBy((w) => w);
    const kept = counts
      .filter((count) => count >= minCount)
      .entrySeq()
      .sort(([wordA, countA], [wordB, countB]) => countB - countA || (wordA < wordB ? -1 : 1))
      .map(([word]) => word);

    const vocabulary = maxWords === undefined ? kept : kept.take(maxWords);
    debug(
      "fitted on %o distinct words, kept %o (minCount=%o)",
      counts.size,
      vocabulary.count(),
      minCount,
    );

    return new DataIndexer(vocabulary);
  }

  static fitInstances(
    instances: Iterable<TextInstance>,
    config?: DataIndexerConfig,
  ): DataIndexer {
    return DataIndexer.fit(
      List(instances).flatMap((instance) => instance.words()),
      config,
    );
  }

  /** Never fails, unseen words get the unknown index */
  getWordIndex(word: string): number {
    return this.#wordToIndex.get(word, OOV_INDEX);
  }

  getWordFromIndex(index: number): string {
    // List.get counts negative indices from the end
    if (index < 0) return OOV_TOKEN;
    return this.#indexToWord.get(index, OOV_TOKEN);
  }

  /** Count of words, reserved tokens included */
  get vocabSize(): number {
    return this.#indexToWord.size;
  }
}
