/** A line record matches none of the accepted shapes */
export class FormatError extends Error {
  readonly kind = "format";
  override readonly name = "FormatError";

  constructor(
    readonly line: string,
    reason = "Unrecognized line format",
  ) {
    super(`${reason}: ${line}`);
  }
}

/** The label encoded in a record differs from the label the caller expects */
export class LabelMismatchError extends Error {
  readonly kind = "label-mismatch";
  override readonly name = "LabelMismatchError";

  constructor(
    readonly line: string,
    readonly expected: boolean,
    readonly found: boolean,
  ) {
    super(
      `Label mismatch: expected ${expected} but line encodes ${found}: ${line}`,
    );
  }
}

/** Unbalanced parentheses or commas in a logical form */
export class MalformedTreeError extends Error {
  readonly kind = "malformed-tree";
  override readonly name = "MalformedTreeError";

  constructor(readonly text: string) {
    super(`Malformed binary semantic parse: ${text}`);
  }
}

/** A grouping of instances breaks one of its construction rules */
export class InvariantViolationError extends Error {
  readonly kind = "invariant-violation";
  override readonly name = "InvariantViolationError";
}

/** Asked to pad with a missing or impossible length */
export class PaddingError extends Error {
  readonly kind = "padding";
  override readonly name = "PaddingError";
}

/** What can go wrong while turning raw input into an instance */
export type InstanceError =
  | FormatError
  | LabelMismatchError
  | MalformedTreeError
  | InvariantViolationError;

export function isInstanceError(e: unknown): e is InstanceError {
  return (
    e instanceof FormatError ||
    e instanceof LabelMismatchError ||
    e instanceof MalformedTreeError ||
    e instanceof InvariantViolationError
  );
}
