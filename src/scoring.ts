import type { CategoryScore, Issue, QualityReport, Severity, SeverityCounts, Verdict } from "./analyzers/types";
import type { ScoringPolicy } from "./analyzers/catalog";
import { SEVERITIES } from "./config";

export const MAX_SCORE = 10;

export function roundScore(value: number): number {
  return Math.round(value * 100) / 100;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function countBySeverity(issues: Issue[]): SeverityCounts {
  const counts: SeverityCounts = { critical: 0, high: 0, medium: 0, low: 0 };
  for (const issue of issues) {
    counts[issue.severity]++;
  }
  return counts;
}

/**
 * One score per category: 10 minus the severity-weighted deductions of its
 * issues. Deductions are summed per severity in a fixed order, so the result
 * depends only on how many issues of each severity there are.
 */
export function scoreCategories(issues: Issue[], policy: ScoringPolicy): CategoryScore[] {
  return policy.categories.map((cat) => {
    const own = issues.filter((issue) => issue.category === cat.id);
    const counts = countBySeverity(own);
    const table = policy.deductions[cat.id];
    const deduction = SEVERITIES.reduce((sum, severity: Severity) => sum + counts[severity] * table[severity], 0);

    return {
      category: cat.id,
      name: cat.name,
      weight: cat.weight,
      score: roundScore(clamp(MAX_SCORE - deduction, 0, MAX_SCORE)),
      issueCount: own.length,
    };
  });
}

/** Weighted sum of the category scores, kept inside their [min, max] range. */
export function calculateOverall(scores: CategoryScore[]): number {
  if (scores.length === 0) {
    return MAX_SCORE;
  }
  const weighted = roundScore(scores.reduce((sum, s) => sum + s.score * s.weight, 0));
  const values = scores.map((s) => s.score);
  return clamp(clamp(weighted, Math.min(...values), Math.max(...values)), 0, MAX_SCORE);
}

const VERDICT_LABELS: Record<Verdict["level"], string> = {
  "not-ready": "Not production ready — fix critical issues first",
  poor: "Poor — major refactor required",
  fair: "Fair — significant improvements needed",
  good: "Good — minor improvements, deployable with monitoring",
  excellent: "Excellent — deploy immediately",
};

export function classifyVerdict(overall: number, criticalCount: number, highCount: number): Verdict {
  let level: Verdict["level"];
  if (criticalCount > 0) {
    level = "not-ready";
  } else if (overall < 5) {
    level = "poor";
  } else if (overall < 7) {
    level = "fair";
  } else if (overall < 9) {
    level = "good";
  } else {
    level = "excellent";
  }

  return {
    level,
    label: VERDICT_LABELS[level],
    productionReady: level === "good" || level === "excellent",
    criticalCount,
    highCount,
  };
}

/** CI gate: minimum overall score and no critical issues. */
export function passesGate(report: QualityReport, minScore: number): boolean {
  return report.overall >= minScore && report.counts.critical === 0;
}

export function starRating(score: number): string {
  const stars = score >= 9 ? 5 : score >= 7 ? 4 : score >= 5 ? 3 : score >= 3 ? 2 : 1;
  return "★".repeat(stars) + "☆".repeat(5 - stars);
}
