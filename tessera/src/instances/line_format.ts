import { FormatError, LabelMismatchError } from "../errors.js";

/** What a tab-separated line record holds */
export interface LineRecord {
  text: string;
  label: boolean | undefined;
  index: number | undefined;
}

const DECIMAL = /^\d+$/;

function parseLabel(field: string, line: string): boolean {
  switch (field) {
    case "1":
      return true;
    case "0":
      return false;
    default:
      throw new FormatError(line, `Label should be 0 or 1, got "${field}"`);
  }
}

function parseIndex(field: string, line: string): number {
  const index = Number.parseInt(field, 10);
  if (!DECIMAL.test(field) || !Number.isSafeInteger(index))
    throw new FormatError(line, `Index should be a non-negative integer, got "${field}"`);
  return index;
}

/**
 * A default label means every line should carry that label,
 * finding another one means some parameter is wrong elsewhere.
 */
function checkLabel(
  label: boolean | undefined,
  defaultLabel: boolean | undefined,
  line: string,
): boolean | undefined {
  if (label !== undefined && defaultLabel !== undefined && label !== defaultLabel)
    throw new LabelMismatchError(line, defaultLabel, label);
  return label ?? defaultLabel;
}

/**
 * Parse one line record, in one of four shapes:
 *
 * (1) [text]
 * (2) [index][tab][text]
 * (3) [text][tab][label]
 * (4) [index][tab][text][tab][label]
 *
 * Shapes (1) and (2) take `defaultLabel`, which may be undefined.
 * Two fields are read as (2) if the first one is only digits, else as (3).
 */
export function parseLine(line: string, defaultLabel?: boolean): LineRecord {
  const fields = line.split("\t");

  switch (fields.length) {
    case 1: {
      const [text] = fields;
      return { text, label: checkLabel(undefined, defaultLabel, line), index: undefined };
    }
    case 2: {
      const [first, second] = fields;
      if (DECIMAL.test(first))
        return {
          text: second,
          label: checkLabel(undefined, defaultLabel, line),
          index: parseIndex(first, line),
        };
      if (DECIMAL.test(second))
        return {
          text: first,
          label: checkLabel(parseLabel(second, line), defaultLabel, line),
          index: undefined,
        };
      throw new FormatError(line);
    }
    case 3: {
      const [index, text, label] = fields;
      return {
        text,
        label: checkLabel(parseLabel(label, line), defaultLabel, line),
        index: parseIndex(index, line),
      };
    }
    default:
      throw new FormatError(line);
  }
}

/** Write a record back in the shortest shape `parseLine` reads it from */
export function toLine({ text, label, index }: LineRecord): string {
  if (/[\t\n\r]/.test(text))
    throw new FormatError(text, "Text can't hold tabs or line breaks");
  // "[digits][tab][label]" would read back as "[index][tab][text]"
  if (index === undefined && label !== undefined && DECIMAL.test(text))
    throw new FormatError(text, "Text made of digits needs an index to be written with a label");

  const fields: string[] = [];
  if (index !== undefined) fields.push(index.toString());
  fields.push(text);
  if (label !== undefined) fields.push(label ? "1" : "0");
  return fields.join("\t");
}
