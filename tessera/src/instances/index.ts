import type { BackgroundInstance } from "./background.js";
import type { LogicalFormInstance } from "./logical_form.js";
import type { QuestionInstance } from "./question.js";
import type { TrueFalseInstance } from "./true_false.js";

export {
  type Instance,
  type Label,
  type TextInstanceLike,
  lazySeq,
} from "./instance.js";
export { type LineRecord, parseLine, toLine } from "./line_format.js";
export { TrueFalseInstance } from "./true_false.js";
export {
  LogicalFormInstance,
  type Linearized,
  linearize,
} from "./logical_form.js";
export { BackgroundInstance, type SentenceInstance } from "./background.js";
export { QuestionInstance, type OptionInstance } from "./question.js";
export {
  type LineFormat,
  type ReadResult,
  readFromLine,
  tryReadFromLine,
} from "./reader.js";

export type TextInstance =
  | TrueFalseInstance
  | LogicalFormInstance
  | BackgroundInstance
  | QuestionInstance;
