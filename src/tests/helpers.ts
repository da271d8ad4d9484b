import type { Issue } from "../analyzers/types";
import type { RuleConfiguration } from "../config";
import { buildCatalog } from "../analyzers/catalog";
import { createSourceUnit } from "../analyzers/source";
import { extractStructure } from "../analyzers/extractor";
import { evaluateRules } from "../analyzers/evaluator";

/** Joins lines into a source text with a trailing newline. */
export function py(...lines: string[]): string {
  return `${lines.join("\n")}\n`;
}

export function extract(text: string) {
  return extractStructure(createSourceUnit("sample.py", text));
}

/** Issues raised by one rule against a source text. */
export function issuesFor(ruleId: string, text: string, config?: RuleConfiguration): Issue[] {
  const catalog = buildCatalog(config);
  const unit = createSourceUnit("sample.py", text);
  const source = extractStructure(unit);
  return evaluateRules(catalog, { unit, source, thresholds: catalog.thresholds })
    .filter((issue) => issue.ruleId === ruleId);
}

export function summarize(issues: Issue[]): [string, string, number][] {
  return issues.map((issue) => [issue.ruleId, issue.severity, issue.line]);
}
