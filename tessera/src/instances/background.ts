import { List } from "immutable";
import type { Seq } from "immutable";

import type { DataIndexer } from "../data_indexer.js";
import { IndexedBackgroundInstance } from "../indexed/index.js";
import type { Tokenizer } from "../processing/text.js";
import { type TextInstanceLike, lazySeq } from "./instance.js";
import type { LogicalFormInstance } from "./logical_form.js";
import type { TrueFalseInstance } from "./true_false.js";

export type SentenceInstance = TrueFalseInstance | LogicalFormInstance;

/**
 * An instance with background knowledge, given as sentences.
 *
 * Label, index and tokenizer are the wrapped instance's. Each background
 * sentence is tokenized on its own.
 */
export class BackgroundInstance
  implements TextInstanceLike<boolean | undefined, IndexedBackgroundInstance>
{
  readonly kind = "background";
  readonly background: List<string>;

  constructor(
    readonly instance: SentenceInstance,
    background: Iterable<string>,
  ) {
    this.background = List(background);
  }

  get label(): boolean | undefined {
    return this.instance.label;
  }

  get index(): number | undefined {
    return this.instance.index;
  }

  get tokenizer(): Tokenizer {
    return this.instance.tokenizer;
  }

  #tokenize(sentence: string): List<string> {
    return this.tokenizer.tokenize(sentence.toLowerCase());
  }

  /** Words of the instance, then the words of each background sentence */
  words(): Seq.Indexed<string> {
    return this.instance
      .words()
      .concat(...this.background.map((sentence) => lazySeq(() => this.#tokenize(sentence))));
  }

  toIndexedInstance(indexer: DataIndexer): IndexedBackgroundInstance {
    return new IndexedBackgroundInstance(
      this.instance.toIndexedInstance(indexer),
      this.background.map((sentence) =>
        this.#tokenize(sentence).map((word) => indexer.getWordIndex(word)),
      ),
    );
  }
}
