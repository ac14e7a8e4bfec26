import type { IndexedBackgroundInstance } from "./background.js";
import type { IndexedLogicalFormInstance } from "./logical_form.js";
import type { IndexedQuestionInstance } from "./question.js";
import type { IndexedTrueFalseInstance } from "./true_false.js";

export { IndexedTrueFalseInstance } from "./true_false.js";
export { IndexedLogicalFormInstance, Transition } from "./logical_form.js";
export {
  IndexedBackgroundInstance,
  type IndexedSentenceInstance,
} from "./background.js";
export { IndexedQuestionInstance, type IndexedOption } from "./question.js";
export {
  PADDING_DIMENSIONS,
  type PaddingDimension,
  type PaddingLengths,
  type Paddable,
  maxPaddingLengths,
  requireLength,
} from "./padding.js";

export type IndexedInstance =
  | IndexedTrueFalseInstance
  | IndexedLogicalFormInstance
  | IndexedBackgroundInstance
  | IndexedQuestionInstance;
