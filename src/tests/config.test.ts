import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";

import type { Severity } from "../analyzers/types";
import { loadConfigFile, parseRuleConfiguration, resolveConfiguration } from "../config";
import { ConfigurationError } from "../errors";

const KNOWN_RULES = new Map<string, Severity>([["print-statement", "low"], ["bare-except", "high"]]);

function problemsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.problems;
    }
    throw error;
  }
  assert.fail("expected a ConfigurationError");
}

describe("parseRuleConfiguration", () => {
  it("accepts an empty object", () => {
    assert.deepStrictEqual(parseRuleConfiguration({}), {});
  });

  it("rejects unknown keys", () => {
    const problems = problemsOf(() => parseRuleConfiguration({ thresholdz: {} }));
    assert.strictEqual(problems.length, 1);
    assert.match(problems[0] ?? "", /^\(root\): Unrecognized key/);
  });

  it("rejects out-of-range values with their path", () => {
    const problems = problemsOf(() => parseRuleConfiguration({ thresholds: { maxLineLength: -1 } }));
    assert.strictEqual(problems.length, 1);
    assert.match(problems[0] ?? "", /^thresholds\.maxLineLength: /);
  });

  it("rejects unknown severities", () => {
    const problems = problemsOf(() => parseRuleConfiguration({ rules: { "print-statement": { severity: "urgent" } } }));
    assert.match(problems[0] ?? "", /^rules\.print-statement\.severity: /);
  });

  it("rejects deductions and weights that overflow to infinity", () => {
    const deductions = problemsOf(() => parseRuleConfiguration(JSON.parse('{"deductions":{"low":1e999}}')));
    assert.strictEqual(deductions.length, 1);
    assert.match(deductions[0] ?? "", /^deductions\.low: /);

    const weights = problemsOf(() => parseRuleConfiguration({ weights: { structure: Number.POSITIVE_INFINITY } }));
    assert.strictEqual(weights.length, 1);
    assert.match(weights[0] ?? "", /^weights\.structure: /);
  });
});

describe("resolveConfiguration", () => {
  it("falls back to the defaults", () => {
    const resolved = resolveConfiguration(undefined, KNOWN_RULES);
    assert.strictEqual(resolved.thresholds.maxFunctionLength, 100);
    assert.strictEqual(resolved.thresholds.warnFunctionLength, 50);
    assert.strictEqual(resolved.thresholds.maxLineLength, 120);
    assert.deepStrictEqual(resolved.deductions.structure, { critical: 4, high: 2, medium: 1, low: 0.3 });
    assert.deepStrictEqual(resolved.rules.get("bare-except"), { enabled: true, severity: "high" });
  });

  it("layers per-category deductions over the global ones", () => {
    const resolved = resolveConfiguration(
      { deductions: { low: 1, categories: { security: { critical: 5 } } } },
      KNOWN_RULES,
    );
    assert.deepStrictEqual(resolved.deductions.security, { critical: 5, high: 2, medium: 1, low: 1 });
    assert.deepStrictEqual(resolved.deductions.structure, { critical: 4, high: 2, medium: 1, low: 1 });
  });

  it("rejects a warning length above the hard limit", () => {
    const problems = problemsOf(() =>
      resolveConfiguration({ thresholds: { maxFunctionLength: 40, warnFunctionLength: 60 } }, KNOWN_RULES));
    assert.deepStrictEqual(problems, ["thresholds.warnFunctionLength (60) exceeds maxFunctionLength (40)"]);
  });

  it("rejects weights that do not sum to one", () => {
    const problems = problemsOf(() => resolveConfiguration({ weights: { structure: 0.5 } }, KNOWN_RULES));
    assert.strictEqual(problems.length, 1);
    assert.match(problems[0] ?? "", /^category weights must sum to 1\.0, got 1\.(29|3)/);
  });

  it("rejects non-positive weights", () => {
    const problems = problemsOf(() => resolveConfiguration({ weights: { security: 0 } }, KNOWN_RULES));
    assert.ok(problems.includes("weights.security must be in (0, 1], got 0"));
  });

  it("reports every problem at once", () => {
    const problems = problemsOf(() => resolveConfiguration({
      thresholds: { maxFunctionLength: 10 },
      rules: { "no-such-rule": { enabled: true } },
    }, KNOWN_RULES));
    assert.deepStrictEqual(problems, [
      "thresholds.warnFunctionLength (50) exceeds maxFunctionLength (10)",
      "rules.no-such-rule: unknown rule identifier",
    ]);
  });
});

describe("loadConfigFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "quality-gauge-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads and validates a JSON file", () => {
    const file = join(dir, "rules.json");
    writeFileSync(file, JSON.stringify({ thresholds: { maxLineLength: 100 } }));
    assert.deepStrictEqual(loadConfigFile(file), { thresholds: { maxLineLength: 100 } });
  });

  it("reports invalid JSON", () => {
    const file = join(dir, "rules.json");
    writeFileSync(file, "{ not json");
    const problems = problemsOf(() => loadConfigFile(file));
    assert.match(problems[0] ?? "", /is not valid JSON/);
  });

  it("reports a missing file", () => {
    const problems = problemsOf(() => loadConfigFile(join(dir, "absent.json")));
    assert.match(problems[0] ?? "", /^cannot read /);
  });
});
