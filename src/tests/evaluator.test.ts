import { describe, it, before, after } from "node:test";
import assert from "node:assert";

import type { Issue, Rule, RuleMatch } from "../analyzers/types";
import { buildCatalog } from "../analyzers/catalog";
import { SEVERITY_RANK, evaluateRules, sortIssues } from "../analyzers/evaluator";
import { createSourceUnit } from "../analyzers/source";
import { extractStructure } from "../analyzers/extractor";
import { getLogLevel, setLogLevel } from "../logger";
import { summarize } from "./helpers";

function rule(id: string, severity: Rule["severity"], check: () => RuleMatch[]): Rule {
  return { id, title: id, category: "best-practices", severity, description: id, check };
}

function run(rules: Rule[], text: string): Issue[] {
  const catalog = buildCatalog(undefined, rules);
  const unit = createSourceUnit("sample.py", text);
  return evaluateRules(catalog, { unit, source: extractStructure(unit), thresholds: catalog.thresholds });
}

describe("evaluateRules", () => {
  const previous = getLogLevel();
  before(() => setLogLevel("silent"));
  after(() => setLogLevel(previous));

  it("isolates a rule that throws", () => {
    const issues = run([
      rule("steady", "low", () => [{ line: 1, message: "found" }]),
      rule("explodes", "high", () => {
        throw new Error("boom");
      }),
    ], "x = 1\n");

    assert.deepStrictEqual(summarize(issues), [["explodes", "low", 0], ["steady", "low", 1]]);
    assert.strictEqual(issues[0]?.title, "Rule Internal Error");
    assert.strictEqual(issues[0]?.message, "Rule 'explodes' failed and was skipped: boom");
    assert.strictEqual(issues[0]?.category, "best-practices");
  });

  it("treats matches outside the source as a rule failure", () => {
    const issues = run([rule("stray", "medium", () => [{ line: 99, message: "far away" }])], "x = 1\n");
    assert.deepStrictEqual(summarize(issues), [["stray", "low", 0]]);
    assert.strictEqual(issues[0]?.message, "Rule 'stray' failed and was skipped: match on line 99 is outside 0..1");
  });

  it("orders by severity, then line, then registration order", () => {
    const issues = run([
      rule("first", "low", () => [{ line: 2, message: "a" }, { line: 1, message: "b" }]),
      rule("second", "high", () => [{ line: 2, message: "c" }]),
      rule("third", "low", () => [{ line: 1, message: "d" }]),
    ], "x = 1\ny = 2\n");
    assert.deepStrictEqual(issues.map((i) => i.message), ["c", "b", "d", "a"]);
  });

  it("uses the effective severity from configuration", () => {
    const rules = [rule("tunable", "low", () => [{ line: 1, message: "m", suggestion: "s" }])];
    const catalog = buildCatalog({ rules: { tunable: { severity: "critical" } } }, rules);
    const unit = createSourceUnit("sample.py", "x = 1\n");
    const issues = evaluateRules(catalog, { unit, source: extractStructure(unit), thresholds: catalog.thresholds });
    assert.deepStrictEqual(issues, [{
      ruleId: "tunable",
      title: "tunable",
      category: "best-practices",
      severity: "critical",
      line: 1,
      message: "m",
      suggestion: "s",
    }]);
  });
});

describe("sortIssues", () => {
  it("keeps the relative order of equal keys", () => {
    const make = (message: string): Issue => ({
      ruleId: "r", title: "r", category: "security", severity: "medium", line: 4, message,
    });
    const sorted = sortIssues([
      { issue: make("one"), order: 0 },
      { issue: make("two"), order: 0 },
      { issue: make("three"), order: 0 },
    ]);
    assert.deepStrictEqual(sorted.map((i) => i.message), ["one", "two", "three"]);
  });

  it("ranks critical above low", () => {
    assert.ok(SEVERITY_RANK.critical < SEVERITY_RANK.high);
    assert.ok(SEVERITY_RANK.medium < SEVERITY_RANK.low);
  });
});
