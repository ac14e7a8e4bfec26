import { List } from "immutable";
import type { Seq } from "immutable";

import type { DataIndexer } from "../data_indexer.js";
import { InvariantViolationError } from "../errors.js";
import { IndexedQuestionInstance } from "../indexed/index.js";
import type { Tokenizer } from "../processing/text.js";
import type { TextInstanceLike } from "./instance.js";
import type { BackgroundInstance } from "./background.js";
import type { LogicalFormInstance } from "./logical_form.js";
import type { TrueFalseInstance } from "./true_false.js";

export type OptionInstance =
  | TrueFalseInstance
  | LogicalFormInstance
  | BackgroundInstance;

/**
 * Answer options grouped into a single multiple-choice instance.
 *
 * Exactly one option is labeled true, the question's label is its position.
 */
export class QuestionInstance
  implements TextInstanceLike<number, IndexedQuestionInstance>
{
  readonly kind = "question";
  readonly options: List<OptionInstance>;
  readonly label: number;
  readonly index?: number;
  readonly tokenizer: Tokenizer | undefined;

  constructor(options: Iterable<OptionInstance>) {
    this.options = List(options);

    const positives = this.options.flatMap((option, i) =>
      option.label === true ? [i] : [],
    );
    const label = positives.first();
    if (positives.size !== 1 || label === undefined)
      throw new InvariantViolationError(
        `a question needs exactly one option labeled true, got ${positives.size} in ${this.options.size} options`,
      );

    this.label = label;
    this.tokenizer = this.options.first()?.tokenizer;
  }

  words(): Seq.Indexed<string> {
    return this.options.toSeq().flatMap((option) => option.words());
  }

  toIndexedInstance(indexer: DataIndexer): IndexedQuestionInstance {
    return new IndexedQuestionInstance(
      this.options.map((option) => option.toIndexedInstance(indexer)),
      this.label,
    );
  }
}
