import { type InstanceError, isInstanceError } from "../errors.js";
import type { Tokenizer } from "../processing/text.js";
import type { SentenceInstance } from "./background.js";
import { LogicalFormInstance } from "./logical_form.js";
import { TrueFalseInstance } from "./true_false.js";

/** How the text of a line record should be understood */
export type LineFormat = "true-false" | "logical-form";

export type ReadResult =
  | { ok: true; instance: SentenceInstance }
  | { ok: false; error: InstanceError };

export function readFromLine(
  line: string,
  format: LineFormat,
  defaultLabel?: boolean,
  tokenizer?: Tokenizer,
): SentenceInstance {
  switch (format) {
    case "true-false":
      return TrueFalseInstance.readFromLine(line, defaultLabel, tokenizer);
    case "logical-form":
      return LogicalFormInstance.readFromLine(line, defaultLabel, tokenizer);
  }
}

/** Same as `readFromLine` but returns what went wrong instead of throwing it */
export function tryReadFromLine(
  line: string,
  format: LineFormat,
  defaultLabel?: boolean,
  tokenizer?: Tokenizer,
): ReadResult {
  try {
    return {
      ok: true,
      instance: readFromLine(line, format, defaultLabel, tokenizer),
    };
  } catch (e) {
    if (isInstanceError(e)) return { ok: false, error: e };
    throw e;
  }
}
