import type { Map } from "immutable";
import {
  type DataIndexerConfig,
  type Dataset,
  type PaddingLengths,
  type ReaderConfig,
  fitDataIndexer,
  indexInstances,
  padToLongest,
  readInstances,
} from "@tessera/tessera";

export interface Summary {
  instances: number;
  vocabSize: number;
  lengths: PaddingLengths;
  /** Instance count per label, "unlabeled" for those without */
  labels: Map<string, number>;
}

/** Read, index and pad every record, reporting what came out */
export async function summarize(
  lines: Dataset<string>,
  config?: ReaderConfig & DataIndexerConfig,
): Promise<Summary> {
  const instances = readInstances(lines, config).cached();
  const indexer = await fitDataIndexer(instances, config);
  const { lengths, instances: padded } = await padToLongest(
    indexInstances(instances, indexer),
  );

  return {
    instances: padded.size,
    vocabSize: indexer.vocabSize,
    lengths,
    labels: padded.countBy((instance) =>
      instance.label === undefined ? "unlabeled" : instance.label.toString(),
    ),
  };
}

export function formatSummary(summary: Summary): string {
  const lengths = Object.entries(summary.lengths)
    .map(([dimension, length]) => `${dimension}=${length}`)
    .join(", ");
  const labels = summary.labels
    .sortBy((_, label) => label)
    .map((count, label) => `${label}=${count}`)
    .join(", ");

  return [
    `instances: ${summary.instances}`,
    `vocabulary: ${summary.vocabSize} words`,
    `padding: ${lengths}`,
    `labels: ${labels}`,
  ].join("\n");
}
