import * as path from "path";
import * as fs from "fs";
import chalk from "chalk";

import type { QualityReport } from "./analyzers/types";
import type { RuleConfiguration } from "./config";
import { buildCatalog } from "./analyzers/catalog";
import { createSourceUnit } from "./analyzers/source";
import { analyze, degradedReport } from "./engine";
import { passesGate } from "./scoring";
import { describeError } from "./errors";
import { logger } from "./logger";
import { renderConsoleReport } from "./reporter/console";
import { writeJsonReport } from "./reporter/json";
import { writeMarkdownReport } from "./reporter/markdown";

export const REPORT_FORMATS = ["console", "markdown", "json"] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export type ScanOptions = {
  targetPath: string;
  outputDir: string;
  formats: ReportFormat[];
  minScore?: number;
  config?: RuleConfiguration;
  /** Receives console output; defaults to stdout. */
  print?: (text: string) => void;
};

export type ScanResult = {
  reports: QualityReport[];
  passed: boolean;
  written: string[];
};

const SKIPPED_DIRECTORIES = new Set(["node_modules", ".git", "__pycache__", "venv", ".venv"]);

export function scan(options: ScanOptions): ScanResult {
  const print = options.print ?? ((text: string) => console.log(text));
  const rootPath = path.resolve(options.targetPath);

  // Configuration problems reject the whole run before any file is read
  const catalog = buildCatalog(options.config);

  const files = collectPythonFiles(rootPath);
  logger.info(`Analyzing ${files.length} file(s) under ${rootPath}`);

  const baseDir = fs.statSync(rootPath).isDirectory() ? rootPath : path.dirname(rootPath);
  const reports = files.map((filePath) => {
    const name = path.relative(baseDir, filePath).split(path.sep).join("/");
    let text: string;
    try {
      text = fs.readFileSync(filePath, "utf-8");
    } catch (error) {
      logger.warn(`Could not read ${filePath}`, { error: describeError(error) });
      return degradedReport(createSourceUnit(name, ""), catalog, 0, `cannot read file: ${describeError(error)}`);
    }
    return analyze(createSourceUnit(name, text), catalog);
  });

  if (options.formats.includes("console")) {
    for (const report of reports) {
      print(renderConsoleReport(report));
    }
  }

  const written: string[] = [];
  if (options.formats.includes("markdown")) {
    written.push(writeMarkdownReport(reports, options.outputDir));
  }
  if (options.formats.includes("json")) {
    written.push(writeJsonReport(reports, options.outputDir));
  }
  if (written.length > 0) {
    print(chalk.gray(`Reports written to:\n${written.map((p) => `  ${p}`).join("\n")}`));
  }

  const minScore = options.minScore;
  const passed = minScore === undefined || reports.every((report) => passesGate(report, minScore));
  if (minScore !== undefined) {
    print(passed
      ? chalk.green(`Quality gate passed (minimum ${minScore})`)
      : chalk.red(`Quality gate failed (minimum ${minScore}, no critical issues)`));
  }

  return { reports, passed, written };
}

/** A single .py file, or every .py file below a directory, sorted. */
export function collectPythonFiles(target: string): string[] {
  const stat = fs.statSync(target);
  if (stat.isFile()) {
    return target.endsWith(".py") ? [target] : [];
  }
  return walkPythonFiles(target).sort();
}

/** Recursive .py listing; a directory that cannot be read is skipped with a warning. */
export function walkPythonFiles(dir: string): string[] {
  const results: string[] = [];
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    logger.warn(`Skipping unreadable directory ${dir}`, { error: describeError(error) });
    return results;
  }
  for (const entry of entries) {
    if (SKIPPED_DIRECTORIES.has(entry.name)) continue;
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      results.push(...walkPythonFiles(fullPath));
    } else if (entry.isFile() && entry.name.endsWith(".py")) {
      results.push(fullPath);
    }
  }
  return results;
}
