import { expect } from "chai";

import { FormatError, LabelMismatchError } from "../errors.js";
import { type LineRecord, parseLine, toLine } from "./line_format.js";

function instanceToLine(text: string, label?: boolean, index?: number): string {
  let line = "";
  if (index !== undefined) line += `${index}\t`;
  line += text;
  if (label !== undefined) line += label ? "\t1" : "\t0";
  return line;
}

describe("line format", () => {
  const text = "this is a sentence";

  it("handles one column", () => {
    expect(parseLine(text)).to.deep.equal({ text, label: undefined, index: undefined });
  });

  it("handles three columns", () => {
    const record = parseLine(instanceToLine(text, true, 23));

    expect(record).to.deep.equal({ text, label: true, index: 23 });
  });

  it("handles two columns with a label", () => {
    const record = parseLine(instanceToLine(text, false));

    expect(record).to.deep.equal({ text, label: false, index: undefined });
  });

  it("handles two columns with an index", () => {
    const record = parseLine(instanceToLine(text, undefined, 23));

    expect(record).to.deep.equal({ text, label: undefined, index: 23 });
  });

  it("reads the first column as an index when both are digits", () => {
    expect(parseLine("12\t1")).to.deep.equal({ text: "1", label: undefined, index: 12 });
  });

  it("rejects indices too large to keep exactly", () => {
    expect(() => parseLine("12345678901234567890\tx")).to.throw(FormatError);
    expect(() => parseLine("12345678901234567890\tx\t1")).to.throw(FormatError);
    expect(parseLine("9007199254740991\tx").index).to.equal(Number.MAX_SAFE_INTEGER);
  });

  it("uses the default label for lines without one", () => {
    expect(parseLine(text, true).label).to.be.true;
    expect(parseLine(instanceToLine(text, undefined, 3), false).label).to.be.false;
  });

  it("accepts labels matching the default", () => {
    expect(parseLine(instanceToLine(text, true, 3), true).label).to.be.true;
  });

  it("rejects labels differing from the default", () => {
    const line = instanceToLine(text, true, 23);

    expect(() => parseLine(line, false))
      .to.throw(LabelMismatchError)
      .with.property("expected", false);
    expect(() => parseLine(instanceToLine(text, false), true)).to.throw(
      LabelMismatchError,
    );
  });

  it("rejects lines of no known shape", () => {
    expect(() => parseLine("a\tb")).to.throw(FormatError, "Unrecognized line format: a\tb");
    expect(() => parseLine("1\t2\t3\t4")).to.throw(FormatError);
    expect(() => parseLine("x\ttext\t1")).to.throw(FormatError);
    expect(() => parseLine("1\ttext\t2")).to.throw(FormatError);
    expect(() => parseLine("text\t23")).to.throw(FormatError);
  });

  it("names the offending line", () => {
    expect(() => parseLine("a\tb"))
      .to.throw(FormatError)
      .with.property("line", "a\tb");
  });

  it("writes records back in a readable shape", () => {
    const records: LineRecord[] = [
      { text, label: undefined, index: undefined },
      { text, label: true, index: undefined },
      { text, label: undefined, index: 3 },
      { text: "42", label: false, index: 0 },
    ];

    for (const record of records)
      expect(parseLine(toLine(record))).to.deep.equal(record);
  });

  it("refuses to write what would read back differently", () => {
    expect(() => toLine({ text: "a\tb", label: true, index: 1 })).to.throw(FormatError);
    expect(() => toLine({ text: "42", label: true, index: undefined })).to.throw(FormatError);
  });
});
