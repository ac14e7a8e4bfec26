import { loadLines } from "@tessera/tessera-node";

import { parseOptions } from "./args.js";
import { formatSummary, summarize } from "./summary.js";

async function main(): Promise<void> {
  const { file, ...config } = parseOptions(process.argv.slice(2));

  const summary = await summarize(loadLines(file), config);
  console.log(formatSummary(summary));
}

// You can run this with "npm start -- <file>" from this folder
main().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : e);
  process.exitCode = 1;
});
