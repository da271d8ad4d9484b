import type { Issue, RuleContext, RuleMatch, Severity } from "./types";
import type { CatalogEntry, RuleCatalog } from "./catalog";
import { describeError } from "../errors";
import { logger } from "../logger";

export const SEVERITY_RANK: Record<Severity, number> = {
  critical: 0,
  high: 1,
  medium: 2,
  low: 3,
};

export type RankedIssue = {
  issue: Issue;
  order: number; // catalog registration order, -1 for engine-generated issues
};

/**
 * Runs every catalog entry against the extracted facts. A rule that throws is
 * skipped and replaced by one low-severity internal-error issue.
 */
export function evaluateRules(catalog: RuleCatalog, context: RuleContext): Issue[] {
  const ranked: RankedIssue[] = [];

  for (const entry of catalog.entries) {
    let matches: RuleMatch[];
    try {
      matches = entry.rule.check(context);
      assertMatchesInRange(matches, context.unit.lines.length);
    } catch (error) {
      logger.warn(`Rule '${entry.rule.id}' failed on ${context.unit.name}`, { error: describeError(error) });
      ranked.push({ issue: internalErrorIssue(entry, error), order: entry.order });
      continue;
    }

    for (const match of matches) {
      ranked.push({ issue: toIssue(entry, match), order: entry.order });
    }
  }

  return sortIssues(ranked);
}

function assertMatchesInRange(matches: RuleMatch[], lineCount: number): void {
  for (const match of matches) {
    if (!Number.isInteger(match.line) || match.line < 0 || match.line > lineCount) {
      throw new RangeError(`match on line ${match.line} is outside 0..${lineCount}`);
    }
  }
}

function toIssue(entry: CatalogEntry, match: RuleMatch): Issue {
  const issue: Issue = {
    ruleId: entry.rule.id,
    title: entry.rule.title,
    category: entry.rule.category,
    severity: entry.severity,
    line: match.line,
    message: match.message,
  };
  if (match.evidence !== undefined) {
    issue.evidence = match.evidence;
  }
  if (match.suggestion !== undefined) {
    issue.suggestion = match.suggestion;
  }
  return issue;
}

function internalErrorIssue(entry: CatalogEntry, error: unknown): Issue {
  return {
    ruleId: entry.rule.id,
    title: "Rule Internal Error",
    category: entry.rule.category,
    severity: "low",
    line: 0,
    message: `Rule '${entry.rule.id}' failed and was skipped: ${describeError(error)}`,
  };
}

export function sortIssues(ranked: RankedIssue[]): Issue[] {
  // Array.prototype.sort is stable, so matches of one rule on one line keep their order
  return [...ranked]
    .sort((a, b) =>
      SEVERITY_RANK[a.issue.severity] - SEVERITY_RANK[b.issue.severity]
      || a.issue.line - b.issue.line
      || a.order - b.order,
    )
    .map((r) => r.issue);
}
