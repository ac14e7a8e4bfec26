import { List, Repeat } from "immutable";

import { PaddingError } from "../errors.js";

export interface Tokenizer {
  tokenize(text: string): List<string>;
}

export interface TokenizerConfig {
  lowercase?: boolean; // default to false, instances lowercase before tokenizing
}

const CONTRACTION = /(\w)(n't|'s|'re|'ve|'ll|'d|'m)\b/gi;
// periods and commas inside numbers ("3.5", "1,000") stay attached
const STOP = /(?<!\d)[.,]|[.,](?!\d)/g;
const PUNCTUATION = /[^\w\s'.,-]/g;
// quotes opening or closing a word, before contractions add spaces around apostrophes
const QUOTE = /(^|\s)'|'(?=\s|$)/g;

/**
 * Splits a sentence into words, with contractions and punctuation as their own tokens.
 *
 * "this isn't a sentence." -> this, is, n't, a, sentence, .
 */
export class WordTokenizer implements Tokenizer {
  readonly #lowercase: boolean;

  constructor(config?: TokenizerConfig) {
    this.#lowercase = config?.lowercase ?? false;
  }

  tokenize(text: string): List<string> {
    const spaced = (this.#lowercase ? text.toLowerCase() : text)
      .replace(QUOTE, "$1 ' ")
      .replace(CONTRACTION, "$1 $2")
      .replace(STOP, " $& ")
      .replace(PUNCTUATION, " $& ");

    return List(spaced.split(/\s+/)).filter((word) => word !== "");
  }
}

/** Shared by every instance not given its own tokenizer */
export const defaultTokenizer: Tokenizer = new WordTokenizer();

/**
 * Split a logical form into predicates, arguments and the punctuation between them.
 *
 * "for(depend_on(human, plant), oxygen)" ->
 *   for ( depend_on ( human , plant ) , oxygen )
 */
export function tokenizeLogicalForm(text: string): List<string> {
  return List(text.match(/[(),]|[^\s(),]+/g) ?? []);
}

/**
 * Stretch or shrink a sequence to exactly `length` items.
 * Shorter sequences get `fill` on the left, longer ones lose their oldest (leftmost) items.
 *
 * @param sequence what to pad
 * @param length the wanted size
 * @param fill the padding value
 * @returns a sequence of size `length`, ending with the most recent items of `sequence`
 */
export function padSequence<T>(
  sequence: List<T>,
  length: number,
  fill: T,
): List<T> {
  if (!Number.isInteger(length) || length < 0)
    throw new PaddingError(`length should be a non-negative integer, got ${length}`);

  if (sequence.size < length)
    return Repeat(fill, length - sequence.size).toList().concat(sequence);
  return sequence.takeLast(length);
}
