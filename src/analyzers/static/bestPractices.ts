import type { Rule } from "../types";

const PRINT_CALL = /(?<![\w.])print\s*\(/;
const WILDCARD_IMPORT = /^from\s+\S+\s+import\s+\*/;
const MUTABLE_DEFAULT = /^(?:\[.*\]|\{.*\}|(?:list|dict|set)\(\s*\))$/;

export const bestPracticeRules: Rule[] = [
  {
    id: "print-statement",
    title: "Print Statement",
    category: "best-practices",
    severity: "low",
    description: "print() used where a logger is expected",
    check: ({ source }) =>
      source.logicalLines
        .filter((l) => PRINT_CALL.test(l.code))
        .map((l) => ({
          line: l.startLine,
          message: "Consider using logging instead of print()",
          evidence: l.code,
          suggestion: "logger = logging.getLogger(__name__); logger.info(...)",
        })),
  },
  {
    id: "line-too-long",
    title: "Line Too Long",
    category: "best-practices",
    severity: "low",
    description: "Physical line longer than maxLineLength characters",
    check: ({ unit, thresholds }) =>
      unit.lines.flatMap((raw, i) =>
        raw.length > thresholds.maxLineLength
          ? [{ line: i + 1, message: `Line is ${raw.length} characters (>${thresholds.maxLineLength})` }]
          : [],
      ),
  },
  {
    id: "wildcard-import",
    title: "Wildcard Import",
    category: "best-practices",
    severity: "low",
    description: "from module import *",
    check: ({ source }) =>
      source.logicalLines
        .filter((l) => WILDCARD_IMPORT.test(l.code))
        .map((l) => ({
          line: l.startLine,
          message: "Wildcard import hides where names come from",
          evidence: l.code,
          suggestion: "Import the names you use explicitly",
        })),
  },
  {
    id: "mutable-default-argument",
    title: "Mutable Default Argument",
    category: "best-practices",
    severity: "medium",
    description: "Parameter default is a list, dict or set shared across calls",
    check: ({ source }) =>
      source.elements.flatMap((e) =>
        e.params
          .filter((p) => p.defaultValue !== undefined && MUTABLE_DEFAULT.test(p.defaultValue))
          .map((p) => ({
            line: e.startLine,
            message: `Parameter '${p.name}' of '${e.name}' defaults to a mutable value`,
            suggestion: `Default to None and create the value inside '${e.name}'`,
          })),
      ),
  },
];
