#!/usr/bin/env node

import { Command } from "commander";
import { REPORT_FORMATS, type ReportFormat, scan } from "./scanner";
import { loadConfigFile } from "./config";
import { ConfigurationError } from "./errors";

const program = new Command();

program
  .name("quality-gauge")
  .description("Python code quality scorer — rule-based issues, category scores and a production-readiness verdict")
  .version("1.0.0");

program
  .command("analyze")
  .description("Analyze a Python file or directory")
  .argument("<path>", "Path to a .py file or a directory")
  .option("--config <file>", "JSON rule configuration (rule overrides, thresholds, weights, deductions)")
  .option("--output-dir <dir>", "Output directory for reports", ".")
  .option("--format <format>", "console, markdown, json or all (comma separated)", "console")
  .option("--min-score <score>", "Fail when any file scores below this or has critical issues")
  .action((targetPath: string, options: { config?: string; outputDir: string; format: string; minScore?: string }) => {
    try {
      const result = scan({
        targetPath,
        outputDir: options.outputDir,
        formats: parseFormats(options.format),
        minScore: options.minScore === undefined ? undefined : parseMinScore(options.minScore),
        config: options.config === undefined ? undefined : loadConfigFile(options.config),
      });
      if (!result.passed) {
        process.exit(1);
      }
    } catch (error) {
      if (error instanceof ConfigurationError) {
        console.error("Invalid configuration:");
        for (const problem of error.problems) {
          console.error(`  - ${problem}`);
        }
      } else {
        console.error("Error:", error instanceof Error ? error.message : error);
      }
      process.exit(1);
    }
  });

export function parseFormats(value: string): ReportFormat[] {
  const formats: ReportFormat[] = [];
  for (const part of value.split(",").map((p) => p.trim().toLowerCase())) {
    if (part === "all") {
      return [...REPORT_FORMATS];
    }
    const known = REPORT_FORMATS.find((f) => f === part);
    if (known === undefined) {
      throw new Error(`Invalid --format value: "${part}". Must be one of ${REPORT_FORMATS.join(", ")} or all.`);
    }
    if (!formats.includes(known)) formats.push(known);
  }
  return formats;
}

function parseMinScore(value: string): number {
  const score = Number(value);
  if (!Number.isFinite(score) || score < 0 || score > 10) {
    throw new Error(`Invalid --min-score value: "${value}". Must be a number between 0 and 10.`);
  }
  return score;
}

if (require.main === module) {
  program.parse();
}
