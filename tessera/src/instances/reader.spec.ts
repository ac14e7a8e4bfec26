import { expect } from "chai";

import { DataIndexer } from "../data_indexer.js";
import { FormatError, MalformedTreeError } from "../errors.js";
import { LogicalFormInstance } from "./logical_form.js";
import { readFromLine, tryReadFromLine } from "./reader.js";
import { TrueFalseInstance } from "./true_false.js";

describe("line reader", () => {
  it("builds the instance kind of the format", () => {
    expect(readFromLine("text", "true-false")).to.be.instanceOf(TrueFalseInstance);
    expect(readFromLine("p(x)", "logical-form")).to.be.instanceOf(LogicalFormInstance);
  });

  it("returns the instance when the line is valid", () => {
    const result = tryReadFromLine("4\tsome text\t1", "true-false");

    expect(result.ok).to.be.true;
    if (result.ok) {
      expect(result.instance.text).to.equal("some text");
      expect(result.instance.index).to.equal(4);
    }
  });

  it("returns the error instead of throwing it", () => {
    const result = tryReadFromLine("a\tb", "true-false");

    expect(result.ok).to.be.false;
    if (!result.ok) {
      expect(result.error).to.be.instanceOf(FormatError);
      expect(result.error.kind).to.equal("format");
    }
  });

  it("doesn't check trees before indexing", () => {
    const instance = readFromLine("a(b))", "logical-form");

    expect(() => instance.toIndexedInstance(new DataIndexer())).to.throw(MalformedTreeError);
  });
});
