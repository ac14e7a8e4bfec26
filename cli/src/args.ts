import { parseArgs } from "node:util";
import type {
  DataIndexerConfig,
  LineFormat,
  ReaderConfig,
} from "@tessera/tessera";

export interface Options extends ReaderConfig, DataIndexerConfig {
  file: string;
}

export const USAGE =
  "usage: tessera-index <file> [--format true-false|logical-form] " +
  "[--default-label true|false] [--min-count n] [--max-words n] [--skip-errors]";

function parseFormat(value: string | undefined): LineFormat | undefined {
  switch (value) {
    case undefined:
    case "true-false":
    case "logical-form":
      return value;
    default:
      throw new Error(`unknown format "${value}"\n${USAGE}`);
  }
}

function parseLabel(value: string | undefined): boolean | undefined {
  switch (value) {
    case undefined:
      return undefined;
    case "true":
      return true;
    case "false":
      return false;
    default:
      throw new Error(`--default-label should be true or false, got "${value}"`);
  }
}

function parseCount(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const count = Number(value);
  if (!Number.isInteger(count) || count < 1)
    throw new Error(`--${name} should be a positive integer, got "${value}"`);
  return count;
}

export function parseOptions(args: string[]): Options {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      format: { type: "string" },
      "default-label": { type: "string" },
      "min-count": { type: "string" },
      "max-words": { type: "string" },
      "skip-errors": { type: "boolean" },
    },
  });

  const [file] = positionals;
  if (file === undefined || positionals.length > 1) throw new Error(USAGE);

  return {
    file,
    format: parseFormat(values.format),
    defaultLabel: parseLabel(values["default-label"]),
    minCount: parseCount("min-count", values["min-count"]),
    maxWords: parseCount("max-words", values["max-words"]),
    onError: values["skip-errors"] === true ? "skip" : "abort",
  };
}
