import { PaddingError } from "../errors.js";

/** Every named dimension an indexed instance can be padded along */
export const PADDING_DIMENSIONS = [
  "num_sentence_words",
  "num_transitions",
  "num_background_sentences",
  "num_background_words",
  "num_options",
] as const;

export type PaddingDimension = (typeof PADDING_DIMENSIONS)[number];

/** Wanted size per dimension, only the dimensions an instance declares are read */
export type PaddingLengths = Partial<Record<PaddingDimension, number>>;

export interface Paddable {
  getPaddingLengths(): PaddingLengths;
}

export function requireLength(
  lengths: PaddingLengths,
  dimension: PaddingDimension,
): number {
  const length = lengths[dimension];
  if (length === undefined)
    throw new PaddingError(`no padding length given for ${dimension}`);
  return length;
}

/**
 * Largest length seen for each dimension.
 * Padding every instance to it gives them all the same shape.
 */
export function maxPaddingLengths(instances: Iterable<Paddable>): PaddingLengths {
  const ret: PaddingLengths = {};
  for (const instance of instances) {
    const lengths = instance.getPaddingLengths();
    for (const dimension of PADDING_DIMENSIONS) {
      const length = lengths[dimension];
      if (length !== undefined)
        ret[dimension] = Math.max(ret[dimension] ?? 0, length);
    }
  }
  return ret;
}
