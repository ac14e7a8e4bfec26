export * as processing from "./processing/index.js";

export { Dataset } from "./dataset/dataset.js";
export {
  type ReaderConfig,
  fitDataIndexer,
  groupQuestions,
  indexInstances,
  padToLongest,
  readBackground,
  readInstances,
  withBackground,
} from "./dataset/text.js";

export {
  DataIndexer,
  type DataIndexerConfig,
  OOV_INDEX,
  OOV_TOKEN,
  PADDING_INDEX,
  PADDING_TOKEN,
} from "./data_indexer.js";

export * from "./errors.js";
export * from "./instances/index.js";
export * from "./indexed/index.js";
