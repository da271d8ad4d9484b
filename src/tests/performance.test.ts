import { describe, it } from "node:test";
import assert from "node:assert";

import { loopIterable } from "../analyzers/static/performance";
import { extract, issuesFor, py } from "./helpers";

describe("comprehension-opportunity", () => {
  it("flags a loop that only appends behind a filter", () => {
    const text = py(
      "def evens(values):",
      "    out = []",
      "    for v in values:",
      "        if v % 2 == 0:",
      "            out.append(v)",
      "    return out",
    );
    const issues = issuesFor("comprehension-opportunity", text);
    assert.deepStrictEqual(issues.map((i) => [i.severity, i.line, i.message]), [
      ["low", 3, "Consider using list comprehension"],
    ]);
  });

  it("flags one-line and plain append loops", () => {
    const text = py(
      "for v in values: out.append(v)",
      "for v in values:",
      "    out.append(v * 2)",
    );
    assert.deepStrictEqual(issuesFor("comprehension-opportunity", text).map((i) => i.line), [1, 2]);
  });

  it("ignores loops that do more than append", () => {
    const text = py(
      "for v in values:",
      "    log(v)",
      "    out.append(v)",
    );
    assert.deepStrictEqual(issuesFor("comprehension-opportunity", text), []);
  });
});

describe("nested-loop-same-collection", () => {
  it("flags an inner loop over the outer loop's collection", () => {
    const text = py(
      "for a in items:",
      "    for b in items:",
      "        pair(a, b)",
    );
    const issues = issuesFor("nested-loop-same-collection", text);
    assert.deepStrictEqual(issues.map((i) => [i.severity, i.line, i.message]), [
      ["medium", 2, "Nested loop over 'items' (outer loop on line 1) is O(n²)"],
    ]);
  });

  it("compares iterables without whitespace", () => {
    const text = py(
      "for a in self.items :",
      "    for b in  self.items:",
      "        pair(a, b)",
    );
    assert.deepStrictEqual(issuesFor("nested-loop-same-collection", text).map((i) => i.line), [2]);
  });

  it("ignores nested loops over different collections", () => {
    const text = py(
      "for a in left:",
      "    for b in right:",
      "        pair(a, b)",
    );
    assert.deepStrictEqual(issuesFor("nested-loop-same-collection", text), []);
  });
});

describe("loopIterable", () => {
  it("reads the expression after 'in'", () => {
    const { logicalLines } = extract(py("for key, value in table.items():", "    pass"));
    const [header] = logicalLines;
    assert.ok(header);
    assert.strictEqual(loopIterable(header), "table.items()");
  });
});
