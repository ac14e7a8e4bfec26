import { expect } from "chai";
import { Dataset, FormatError } from "@tessera/tessera";

import { formatSummary, summarize } from "./summary.js";

describe("summary", () => {
  const lines = new Dataset(["The cat sat.\t1", "A dog\t0", "", "unlabeled words"]);

  it("counts instances, words and labels", async () => {
    const summary = await summarize(lines);

    expect(summary.instances).to.equal(3);
    expect(summary.vocabSize).to.equal(10);
    expect(summary.lengths).to.deep.equal({ num_sentence_words: 4 });
    expect(summary.labels.toObject()).to.deep.equal({ true: 1, false: 1, unlabeled: 1 });
  });

  it("formats one line per fact", async () => {
    const summary = await summarize(lines, { minCount: 1 });

    expect(formatSummary(summary)).to.equal(
      [
        "instances: 3",
        "vocabulary: 10 words",
        "padding: num_sentence_words=4",
        "labels: false=1, true=1, unlabeled=1",
      ].join("\n"),
    );
  });

  it("fails on bad records unless skipping", async () => {
    const bad = new Dataset(["fine\t1", "not\ta\tvalid\tline"]);

    let error: unknown;
    try {
      await summarize(bad);
    } catch (e) {
      error = e;
    }
    expect(error).to.be.instanceOf(FormatError);

    const summary = await summarize(bad, { onError: "skip" });
    expect(summary.instances).to.equal(1);
  });
});
