import createDebug from "debug";
import { List, Map } from "immutable";

import { DataIndexer, type DataIndexerConfig } from "../data_indexer.js";
import { FormatError, InvariantViolationError } from "../errors.js";
import {
  type IndexedInstance,
  type PaddingLengths,
  maxPaddingLengths,
} from "../indexed/index.js";
import {
  BackgroundInstance,
  type LineFormat,
  type OptionInstance,
  QuestionInstance,
  type SentenceInstance,
  type TextInstance,
  tryReadFromLine,
} from "../instances/index.js";
import type { Tokenizer } from "../processing/text.js";
import { Dataset } from "./dataset.js";

const debug = createDebug("tessera:dataset:text");

export interface ReaderConfig {
  format?: LineFormat, // default to "true-false"
  defaultLabel?: boolean, // label of lines not carrying one, and expected label of those that do
  tokenizer?: Tokenizer, // default to the shared word tokenizer
  onError?: "abort" | "skip", // default to abort, skipped lines are logged
}

/**
 * Parse line records into instances.
 *
 * Blank lines are ignored. Instances read from a line without an index have none.
 *
 * @param lines the records, one per element
 * @param config how to read them
 * @returns a dataset of instances, failing on the first bad line unless told to skip
 */
export function readInstances(
  lines: Dataset<string>,
  config?: ReaderConfig,
): Dataset<SentenceInstance> {
  const format = config?.format ?? "true-false";
  const onError = config?.onError ?? "abort";

  return new Dataset(async function* () {
    let position = -1;
    for await (const line of lines) {
      position++;
      if (line.trim() === "") continue;

      const result = tryReadFromLine(line, format, config?.defaultLabel, config?.tokenizer);
      if (!result.ok) {
        if (onError === "abort") throw result.error;
        debug("skipping line %o: %s", position, result.error.message);
        continue;
      }

      yield result.instance;
    }
  });
}

/**
 * Parse background records, "[index][tab][sentence][tab][sentence]...",
 * into the sentences of each instance index.
 */
export async function readBackground(
  lines: Dataset<string>,
): Promise<Map<number, List<string>>> {
  let ret = Map<number, List<string>>();
  for await (const line of lines) {
    if (line.trim() === "") continue;

    const [index, ...sentences] = line.split("\t");
    const key = Number.parseInt(index, 10);
    if (!/^\d+$/.test(index) || !Number.isSafeInteger(key))
      throw new FormatError(line, "Background should start with an instance index");

    ret = ret.set(key, ret.get(key, List<string>()).concat(sentences));
  }
  return ret;
}

/** Attach to each instance the background of its index, an empty one if there is none */
export function withBackground(
  instances: Dataset<SentenceInstance>,
  background: Map<number, List<string>>,
): Dataset<BackgroundInstance> {
  return instances.map(
    (instance) =>
      new BackgroundInstance(
        instance,
        instance.index === undefined
          ? List()
          : background.get(instance.index, List<string>()),
      ),
  );
}

/**
 * Group consecutive options into questions.
 *
 * @param optionsPerQuestion how many options make one question
 * @throws InvariantViolationError if a question doesn't have exactly one true option
 *   or if the options can't be split evenly
 */
export function groupQuestions(
  options: Dataset<OptionInstance>,
  optionsPerQuestion: number,
): Dataset<QuestionInstance> {
  if (!Number.isInteger(optionsPerQuestion) || optionsPerQuestion < 1)
    throw new Error("optionsPerQuestion should be a positive integer");

  return new Dataset(async function* () {
    let group = List<OptionInstance>();
    for await (const option of options) {
      group = group.push(option);
      if (group.size === optionsPerQuestion) {
        yield new QuestionInstance(group);
        group = List();
      }
    }

    if (!group.isEmpty())
      throw new InvariantViolationError(
        `${group.size} options left over, questions need ${optionsPerQuestion}`,
      );
  });
}

/** Goes once through the whole dataset, consider caching it beforehand */
export async function fitDataIndexer(
  instances: Dataset<TextInstance>,
  config?: DataIndexerConfig,
): Promise<DataIndexer> {
  return DataIndexer.fitInstances(await instances.toList(), config);
}

export function indexInstances(
  instances: Dataset<TextInstance>,
  indexer: DataIndexer,
): Dataset<IndexedInstance> {
  return instances.map((instance) => instance.toIndexedInstance(indexer));
}

/** Pad every instance to the largest lengths found in the dataset */
export async function padToLongest(
  indexed: Dataset<IndexedInstance>,
): Promise<{ lengths: PaddingLengths; instances: List<IndexedInstance> }> {
  const instances = await indexed.toList();
  const lengths = maxPaddingLengths(instances);
  debug("padding %o instances to %o", instances.size, lengths);

  return {
    lengths,
    instances: instances.map((instance) => instance.pad(lengths)),
  };
}
