import createDebug from "debug";
import { List } from "immutable";
import type { Seq } from "immutable";

import type { DataIndexer } from "../data_indexer.js";
import { MalformedTreeError } from "../errors.js";
import { IndexedLogicalFormInstance, Transition } from "../indexed/index.js";
import {
  type Tokenizer,
  defaultTokenizer,
  tokenizeLogicalForm,
} from "../processing/text.js";
import { type TextInstanceLike, lazySeq } from "./instance.js";
import { parseLine } from "./line_format.js";

const debug = createDebug("tessera:instances:logical-form");

export interface Linearized {
  /** Predicates and arguments, in order of appearance */
  elements: List<string>;
  transitions: List<Transition>;
}

/**
 * Flatten a tokenized logical form into what a stack-based tree encoder reads.
 *
 * Only commas and open parens are stacked: a closing paren reduces two items
 * if it meets an open paren and three if it meets a comma.
 *
 * "a(b(c), d(e, f))" -> [a, b, c, d, e, f] and [S, S, S, R2, S, S, S, R3, R3]
 *
 * @param tokens the logical form, punctuation included
 * @param text the logical form as written, to report errors with
 */
export function linearize(tokens: Iterable<string>, text: string): Linearized {
  const lastSymbols: Array<"," | "("> = [];
  const transitions: Transition[] = [];
  const elements: string[] = [];

  let isMalformed = false;
  for (const token of tokens) {
    if (token === "," || token === "(") {
      lastSymbols.push(token);
    } else if (token === ")") {
      const lastSymbol = lastSymbols.pop();
      if (lastSymbol === undefined) {
        // closing paren without an opening one
        isMalformed = true;
        break;
      }
      if (lastSymbol === "(") {
        transitions.push(Transition.Reduce2);
      } else {
        // the comma follows an open paren, close it as well
        if (lastSymbols.pop() !== "(") {
          isMalformed = true;
          break;
        }
        transitions.push(Transition.Reduce3);
      }
    } else {
      transitions.push(Transition.Shift);
      elements.push(token);
    }
  }

  if (lastSymbols.length !== 0 || isMalformed)
    throw new MalformedTreeError(text);

  return { elements: List(elements), transitions: List(transitions) };
}

const STRUCTURE = new Set(["(", ")", ","]);

/**
 * A tree-structured logical form, such as "for(depend_on(human, plant), oxygen)",
 * meant for tree encoders.
 */
export class LogicalFormInstance
  implements TextInstanceLike<boolean | undefined, IndexedLogicalFormInstance>
{
  readonly kind = "logical-form";

  /**
   * @param tokenizer only used by a wrapping `BackgroundInstance` for its sentences,
   *   the logical form itself is always split by `tokenizeLogicalForm`
   */
  constructor(
    readonly text: string,
    readonly label: boolean | undefined,
    readonly index?: number,
    readonly tokenizer: Tokenizer = defaultTokenizer,
  ) {}

  /** Predicates, arguments, commas and parens */
  tokens(): List<string> {
    return tokenizeLogicalForm(this.text);
  }

  /** Predicates and arguments only */
  words(): Seq.Indexed<string> {
    return lazySeq(() => this.tokens().filterNot((token) => STRUCTURE.has(token)));
  }

  toIndexedInstance(indexer: DataIndexer): IndexedLogicalFormInstance {
    const { elements, transitions } = linearize(this.tokens(), this.text);
    debug("linearized %o into %o transitions", this.text, transitions.size);

    return new IndexedLogicalFormInstance(
      elements.map((element) => indexer.getWordIndex(element)),
      transitions,
      this.label,
      this.index,
    );
  }

  static readFromLine(
    line: string,
    defaultLabel?: boolean,
    tokenizer: Tokenizer = defaultTokenizer,
  ): LogicalFormInstance {
    const { text, label, index } = parseLine(line, defaultLabel);
    return new LogicalFormInstance(text, label, index, tokenizer);
  }
}
