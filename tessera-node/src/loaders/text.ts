import createDebug from "debug";
import { createReadStream } from "node:fs";
import { Dataset } from "@tessera/tessera";

const debug = createDebug("tessera-node:loaders:text");

/**
 * Returns the lines of a text file, without their line endings.
 * The file is streamed, lines spanning two chunks are joined back.
 *
 * @param path path to the text file to read
 * @returns a dataset of lines
 */
export function load(path: string): Dataset<string> {
  return new Dataset(async function* () {
    const stream = createReadStream(path, { encoding: "utf8" });

    let pending = "";
    for await (const chunk of stream) {
      if (typeof chunk !== "string")
        throw new Error("Expected file stream to yield string");

      debug("read chunk of length: %o", chunk.length);
      const lines = (pending + chunk).split("\n");
      pending = lines.pop() ?? "";
      for (const line of lines) yield line.replace(/\r$/, "");
    }

    // no line after the last line break
    if (pending !== "") yield pending.replace(/\r$/, "");
  });
}
