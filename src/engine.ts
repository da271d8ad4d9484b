import type { ExtractedSource, Issue, QualityReport, SourceMetrics, SourceUnit } from "./analyzers/types";
import { type RuleCatalog, UNPARSABLE_SOURCE_ID } from "./analyzers/catalog";
import { evaluateRules } from "./analyzers/evaluator";
import { extractStructure, lineOnlyMetrics } from "./analyzers/extractor";
import { createSourceUnit } from "./analyzers/source";
import { calculateOverall, classifyVerdict, countBySeverity, scoreCategories } from "./scoring";
import { SourceParseError, describeError } from "./errors";
import { logger } from "./logger";

export { buildCatalog } from "./analyzers/catalog";
export type { RuleCatalog } from "./analyzers/catalog";
export { createSourceUnit } from "./analyzers/source";
export { loadConfigFile, parseRuleConfiguration } from "./config";
export type { RuleConfiguration } from "./config";
export { ConfigurationError, SourceParseError } from "./errors";
export { passesGate } from "./scoring";
export type { Issue, QualityReport, Rule, SourceUnit, Verdict } from "./analyzers/types";

/**
 * Analyzes one source unit. Synchronous and free of shared state: reports for
 * different units can be computed in any order or in parallel workers.
 * Never throws for bad input; unparsable sources yield a degraded report.
 */
export function analyze(unit: SourceUnit, catalog: RuleCatalog): QualityReport {
  let source: ExtractedSource;
  try {
    source = extractStructure(unit);
  } catch (error) {
    const line = error instanceof SourceParseError ? error.line : 0;
    const reason = error instanceof SourceParseError ? error.reason : describeError(error);
    logger.debug(`Structural extraction failed for ${unit.name}`, { line, reason });
    return degradedReport(unit, catalog, line, reason);
  }

  const issues = evaluateRules(catalog, { unit, source, thresholds: catalog.thresholds });
  const metrics = source.metrics;
  logger.debug(`Analyzed ${unit.name}`, { issues: issues.length, lines: metrics.totalLines });
  return buildReport(unit.name, issues, metrics, catalog);
}

export function analyzeText(name: string, text: string, catalog: RuleCatalog): QualityReport {
  return analyze(createSourceUnit(name, text), catalog);
}

/** Independent reports, one per unit, in input order. No cross-file rollup. */
export function analyzeAll(units: SourceUnit[], catalog: RuleCatalog): QualityReport[] {
  return units.map((unit) => analyze(unit, catalog));
}

/**
 * Report for a unit that could not be decomposed (or read): one critical issue,
 * line-count-only metrics, no rule evaluation.
 */
export function degradedReport(unit: SourceUnit, catalog: RuleCatalog, line: number, reason: string): QualityReport {
  const issue: Issue = {
    ruleId: UNPARSABLE_SOURCE_ID,
    title: "Unparsable Source",
    category: "structure",
    severity: "critical",
    line: line <= unit.lines.length ? line : 0,
    message: `Source could not be parsed: ${reason}`,
    suggestion: "Fix the syntax error so the file can be analyzed",
  };
  return buildReport(unit.name, [issue], lineOnlyMetrics(unit), catalog);
}

function buildReport(name: string, issues: Issue[], metrics: SourceMetrics, catalog: RuleCatalog): QualityReport {
  const categories = scoreCategories(issues, catalog.scoring);
  const overall = calculateOverall(categories);
  const counts = countBySeverity(issues);

  return {
    source: name,
    overall,
    categories,
    issues,
    counts,
    metrics,
    verdict: classifyVerdict(overall, counts.critical, counts.high),
  };
}
