import { expect } from "chai";
import { List, Map } from "immutable";

import {
  FormatError,
  InvariantViolationError,
  LabelMismatchError,
} from "../errors.js";
import {
  LogicalFormInstance,
  TrueFalseInstance,
} from "../instances/index.js";
import { Dataset } from "./dataset.js";
import {
  fitDataIndexer,
  groupQuestions,
  indexInstances,
  padToLongest,
  readBackground,
  readInstances,
  withBackground,
} from "./text.js";

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (e) {
    return e;
  }
  throw new Error("expected a rejection");
}

describe("text dataset", () => {
  describe("reading instances", () => {
    it("reads every shape", async () => {
      const lines = new Dataset(["first sentence\t1", "", "5\tsecond one\t0", "third"]);

      const instances = await readInstances(lines).toList();

      expect(instances.map((i) => [i.text, i.label, i.index]).toArray()).to.deep.equal([
        ["first sentence", true, undefined],
        ["second one", false, 5],
        ["third", undefined, undefined],
      ]);
      expect(instances.every((i) => i instanceof TrueFalseInstance)).to.be.true;
    });

    it("reads logical forms", async () => {
      const lines = new Dataset(["p(x)\t1"]);

      const instances = await readInstances(lines, { format: "logical-form" }).toList();

      expect(instances.first()).to.be.instanceOf(LogicalFormInstance);
    });

    it("applies the default label", async () => {
      const lines = new Dataset(["a sentence"]);

      const instances = await readInstances(lines, { defaultLabel: false }).toList();

      expect(instances.first()?.label).to.be.false;
    });

    it("aborts on the first bad line", async () => {
      const lines = new Dataset(["good\t1", "bad\tline\there\tnow"]);

      expect(await rejection(readInstances(lines).toList())).to.be.instanceOf(FormatError);
    });

    it("aborts on conflicting labels", async () => {
      const lines = new Dataset(["wrong\t1"]);

      const error = await rejection(readInstances(lines, { defaultLabel: false }).toList());

      expect(error).to.be.instanceOf(LabelMismatchError);
    });

    it("skips bad lines when told to", async () => {
      const lines = new Dataset(["good\t1", "bad\tline\there\tnow", "fine"]);

      const instances = await readInstances(lines, { onError: "skip" }).toList();

      expect(instances.map((i) => i.text).toArray()).to.deep.equal(["good", "fine"]);
    });
  });

  describe("background", () => {
    it("gathers sentences per index", async () => {
      const lines = new Dataset(["0\tbg one\tbg two", "2\tbg three", "", "0\tbg four"]);

      const background = await readBackground(lines);

      expect(background.get(0)?.toArray()).to.deep.equal(["bg one", "bg two", "bg four"]);
      expect(background.get(2)?.toArray()).to.deep.equal(["bg three"]);
    });

    it("needs an index to start each line", async () => {
      const lines = new Dataset(["x\tsentence"]);

      expect(await rejection(readBackground(lines))).to.be.instanceOf(FormatError);
    });

    it("attaches background only to the record carrying its index", async () => {
      const lines = new Dataset(["1\tfirst sentence\t1", "second sentence\t0"]);
      const background = Map([[1, List(["bg for record 1"])]]);

      const wrapped = await withBackground(readInstances(lines), background).toList();

      expect(wrapped.map((i) => i.index).toArray()).to.deep.equal([1, undefined]);
      expect(wrapped.map((i) => i.background.toArray()).toArray()).to.deep.equal([
        ["bg for record 1"],
        [],
      ]);
    });

    it("rejects background indices too large to keep exactly", async () => {
      const lines = new Dataset(["12345678901234567890\tbg"]);

      expect(await rejection(readBackground(lines))).to.be.instanceOf(FormatError);
    });

    it("attaches background by index", async () => {
      const instances = new Dataset([
        new TrueFalseInstance("with", true, 0),
        new TrueFalseInstance("without", false, 1),
      ]);
      const background = Map([[0, List(["some context"])]]);

      const wrapped = await withBackground(instances, background).toList();

      expect(wrapped.map((i) => i.background.toArray()).toArray()).to.deep.equal([
        ["some context"],
        [],
      ]);
      expect(wrapped.map((i) => i.label).toArray()).to.deep.equal([true, false]);
    });
  });

  describe("questions", () => {
    const option = (label: boolean): TrueFalseInstance =>
      new TrueFalseInstance(label ? "right" : "wrong", label);

    it("groups consecutive options", async () => {
      const options = new Dataset([false, true, true, false].map(option));

      const questions = await groupQuestions(options, 2).toList();

      expect(questions.map((q) => q.label).toArray()).to.deep.equal([1, 0]);
    });

    it("fails on left over options", async () => {
      const options = new Dataset([false, true, true].map(option));

      const error = await rejection(groupQuestions(options, 2).toList());

      expect(error).to.be.instanceOf(InvariantViolationError);
    });

    it("fails on questions without a true option", async () => {
      const options = new Dataset([false, false].map(option));

      const error = await rejection(groupQuestions(options, 2).toList());

      expect(error).to.be.instanceOf(InvariantViolationError);
    });

    it("needs a positive group size", () => {
      expect(() => groupQuestions(new Dataset([]), 0)).to.throw();
    });
  });

  it("fits, indexes and pads a whole dataset", async () => {
    const instances = readInstances(new Dataset(["a b\t1", "a\t0"])).cached();

    const indexer = await fitDataIndexer(instances);
    const { lengths, instances: padded } = await padToLongest(
      indexInstances(instances, indexer),
    );

    expect(indexer.getWordIndex("a")).to.equal(2);
    expect(indexer.getWordIndex("b")).to.equal(3);
    expect(lengths).to.deep.equal({ num_sentence_words: 2 });
    expect(
      padded
        .map((i) => (i.kind === "true-false" ? i.wordIndices.toArray() : []))
        .toArray(),
    ).to.deep.equal([
      [2, 3],
      [0, 2],
    ]);
  });
});
