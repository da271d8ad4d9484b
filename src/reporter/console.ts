import chalk from "chalk";
import type { QualityReport, Severity } from "../analyzers/types";
import { SEVERITIES } from "../config";
import { starRating } from "../scoring";

const RULE = "=".repeat(80);
const ISSUES_SHOWN_PER_SEVERITY = 5;

export type ConsoleReportOptions = {
  color?: boolean;
};

export function renderConsoleReport(report: QualityReport, options: ConsoleReportOptions = {}): string {
  const c = options.color === false ? new chalk.Instance({ level: 0 }) : chalk;
  const lines: string[] = [];

  lines.push("", RULE);
  lines.push(c.bold(`CODE QUALITY REPORT - ${report.source}`));
  lines.push(RULE);

  lines.push("");
  lines.push(`Overall Quality Score: ${report.overall.toFixed(1)}/10 ${starRating(report.overall)}`);

  lines.push("");
  lines.push(c.cyan("Category Scores:"));
  for (const cat of report.categories) {
    lines.push(`  - ${cat.name}: ${cat.score.toFixed(1)}/10`);
  }

  lines.push("");
  lines.push(c.cyan("Code Metrics:"));
  lines.push(`  - Lines of Code: ${report.metrics.totalLines}`);
  lines.push(`  - Functions: ${report.metrics.functionCount}`);
  lines.push(`  - Classes: ${report.metrics.classCount}`);
  if (report.metrics.averageFunctionLength > 0) {
    lines.push(`  - Avg Function Length: ${report.metrics.averageFunctionLength.toFixed(1)} lines`);
  }

  lines.push("");
  lines.push(c.cyan(`Issues Found: ${report.issues.length}`));
  for (const severity of SEVERITIES) {
    const issues = report.issues.filter((issue) => issue.severity === severity);
    if (issues.length === 0) {
      continue;
    }
    lines.push("");
    lines.push(paintSeverity(c, severity)(`  ${severity.toUpperCase()} (${issues.length}):`));
    for (const issue of issues.slice(0, ISSUES_SHOWN_PER_SEVERITY)) {
      const lineInfo = issue.line > 0 ? `Line ${issue.line}: ` : "";
      lines.push(`    - ${lineInfo}${issue.title}`);
      lines.push(c.gray(`      ${issue.message}`));
    }
    if (issues.length > ISSUES_SHOWN_PER_SEVERITY) {
      lines.push(c.gray(`    ... and ${issues.length - ISSUES_SHOWN_PER_SEVERITY} more`));
    }
  }

  lines.push("", RULE);
  const banner = report.verdict.productionReady ? c.green : report.verdict.level === "not-ready" ? c.red : c.yellow;
  lines.push(banner(report.verdict.label));
  lines.push(RULE, "");

  return lines.join("\n");
}

function paintSeverity(c: chalk.Chalk, severity: Severity): chalk.Chalk {
  switch (severity) {
    case "critical":
      return c.red.bold;
    case "high":
      return c.red;
    case "medium":
      return c.yellow;
    case "low":
      return c.gray;
  }
}
