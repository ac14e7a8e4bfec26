import type { Seq } from "immutable";

import type { DataIndexer } from "../data_indexer.js";
import { IndexedTrueFalseInstance } from "../indexed/index.js";
import { type Tokenizer, defaultTokenizer } from "../processing/text.js";
import { type TextInstanceLike, lazySeq } from "./instance.js";
import { parseLine } from "./line_format.js";

/** A sentence, either true or false */
export class TrueFalseInstance
  implements TextInstanceLike<boolean | undefined, IndexedTrueFalseInstance>
{
  readonly kind = "true-false";

  constructor(
    readonly text: string,
    readonly label: boolean | undefined,
    readonly index?: number,
    readonly tokenizer: Tokenizer = defaultTokenizer,
  ) {}

  words(): Seq.Indexed<string> {
    return lazySeq(() => this.tokenizer.tokenize(this.text.toLowerCase()));
  }

  toIndexedInstance(indexer: DataIndexer): IndexedTrueFalseInstance {
    return new IndexedTrueFalseInstance(
      this.words().map((word) => indexer.getWordIndex(word)).toList(),
      this.label,
      this.index,
    );
  }

  static readFromLine(
    line: string,
    defaultLabel?: boolean,
    tokenizer: Tokenizer = defaultTokenizer,
  ): TrueFalseInstance {
    const { text, label, index } = parseLine(line, defaultLabel);
    return new TrueFalseInstance(text, label, index, tokenizer);
  }
}
