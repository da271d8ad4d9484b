import { describe, it } from "node:test";
import assert from "node:assert";

import { parseFormats } from "../index";

describe("parseFormats", () => {
  it("expands 'all' to every format", () => {
    assert.deepStrictEqual(parseFormats("all"), ["console", "markdown", "json"]);
  });

  it("reads a comma separated list without duplicates", () => {
    assert.deepStrictEqual(parseFormats("json, Markdown,json"), ["json", "markdown"]);
  });

  it("rejects unknown formats", () => {
    assert.throws(() => parseFormats("console,xml"), {
      message: "Invalid --format value: \"xml\". Must be one of console, markdown, json or all.",
    });
  });
});
