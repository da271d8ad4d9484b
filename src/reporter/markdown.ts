import type { QualityReport } from "../analyzers/types";
import * as fs from "fs";
import * as path from "path";

export function writeMarkdownReport(reports: QualityReport[], outputDir: string): string {
  const filePath = path.join(outputDir, "quality-report.md");
  fs.mkdirSync(outputDir, { recursive: true });
  fs.writeFileSync(filePath, renderMarkdownReport(reports), "utf-8");
  return filePath;
}

export function renderMarkdownReport(reports: QualityReport[]): string {
  const lines: string[] = [];

  lines.push("# Code Quality Report");
  lines.push("");
  lines.push(`Files analyzed: ${reports.length}`);
  lines.push("");

  // Summary table
  lines.push("| File | Score | Verdict | Critical | High | Medium | Low |");
  lines.push("|------|-------|---------|----------|------|--------|-----|");
  for (const report of reports) {
    const { critical, high, medium, low } = report.counts;
    lines.push(`| \`${report.source}\` | ${report.overall.toFixed(1)}/10 | ${report.verdict.label} | ${critical} | ${high} | ${medium} | ${low} |`);
  }
  lines.push("");

  for (const report of reports) {
    lines.push(`## ${report.source} — ${report.overall.toFixed(1)}/10`);
    lines.push("");
    lines.push(`**${report.verdict.label}**`);
    lines.push("");
    lines.push(`- Lines: ${report.metrics.totalLines}`);
    lines.push(`- Functions: ${report.metrics.functionCount} (avg ${report.metrics.averageFunctionLength.toFixed(1)} lines)`);
    lines.push(`- Classes: ${report.metrics.classCount}`);
    lines.push("");

    lines.push("| Category | Weight | Score | Bar |");
    lines.push("|----------|--------|-------|-----|");
    for (const cat of report.categories) {
      lines.push(`| ${cat.name} | ${(cat.weight * 100).toFixed(0)}% | ${cat.score.toFixed(1)}/10 | ${renderScoreBar(cat.score, 10)} |`);
    }
    lines.push("");

    if (report.issues.length > 0) {
      lines.push("| Severity | Line | Rule | Message |");
      lines.push("|----------|------|------|---------|");
      for (const issue of report.issues) {
        const line = issue.line > 0 ? String(issue.line) : "-";
        lines.push(`| ${issue.severity} | ${line} | ${issue.ruleId} | ${escapeCell(issue.message)} |`);
      }
      lines.push("");
    }
  }

  return lines.join("\n");
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|");
}

export function renderScoreBar(score: number, max: number): string {
  const pct = score / max;
  const filled = Math.round(pct * 20);
  const empty = 20 - filled;
  const bar = "█".repeat(filled) + "░".repeat(empty);
  const pctStr = `${(pct * 100).toFixed(0)}%`;
  return `\`${bar}\` ${pctStr}`;
}
