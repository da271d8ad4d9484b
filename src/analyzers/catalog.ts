import type { CategoryDefinition, Rule, Severity, Thresholds } from "./types";
import { structureRules } from "./static/structure";
import { errorHandlingRules } from "./static/errorHandling";
import { performanceRules } from "./static/performance";
import { securityRules } from "./static/security";
import { maintainabilityRules } from "./static/maintainability";
import { bestPracticeRules } from "./static/bestPractices";
import { type DeductionPolicy, type RuleConfiguration, resolveConfiguration } from "../config";
import { ConfigurationError } from "../errors";

export const UNPARSABLE_SOURCE_ID = "unparsable-source";

// Registration order is the last tie-break when issues are sorted.
export const builtinRules: Rule[] = [
  ...structureRules,
  ...errorHandlingRules,
  ...performanceRules,
  ...securityRules,
  ...maintainabilityRules,
  ...bestPracticeRules,
];

export type CatalogEntry = {
  rule: Rule;
  severity: Severity; // effective severity after configuration
  order: number;
};

export type ScoringPolicy = {
  categories: CategoryDefinition[];
  deductions: DeductionPolicy;
};

export type RuleCatalog = {
  entries: CatalogEntry[];
  thresholds: Thresholds;
  scoring: ScoringPolicy;
};

/**
 * Resolves a configuration against a rule registry. Every configuration
 * problem surfaces here, before any source is analyzed.
 */
export function buildCatalog(config?: RuleConfiguration, rules: Rule[] = builtinRules): RuleCatalog {
  const defaults = new Map<string, Severity>();
  const problems: string[] = [];
  for (const rule of rules) {
    if (defaults.has(rule.id)) {
      problems.push(`rule '${rule.id}' is registered twice`);
    }
    if (rule.id === UNPARSABLE_SOURCE_ID) {
      problems.push(`rule id '${UNPARSABLE_SOURCE_ID}' is reserved`);
    }
    defaults.set(rule.id, rule.severity);
  }
  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  const resolved = resolveConfiguration(config, defaults);
  const entries: CatalogEntry[] = [];
  rules.forEach((rule, order) => {
    const setting = resolved.rules.get(rule.id);
    if (setting?.enabled) {
      entries.push({ rule, severity: setting.severity, order });
    }
  });

  return {
    entries,
    thresholds: resolved.thresholds,
    scoring: {
      categories: resolved.categories,
      deductions: resolved.deductions,
    },
  };
}
