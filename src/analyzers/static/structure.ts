import type { LogicalLine, Rule } from "../types";
import { elementLength } from "../extractor";
import { controlParents, countMatches, functions, ownLines } from "./scope";

const DECISION_KEYWORDS = new Set(["if", "elif", "for", "async for", "while", "except", "case"]);
const DUPLICATE_MIN_LENGTH = 20;
const DUPLICATE_MAX_OCCURRENCES = 2;

export function cyclomaticComplexity(lines: LogicalLine[]): number {
  let complexity = 1;
  for (const line of lines) {
    if (line.keyword !== null && DECISION_KEYWORDS.has(line.keyword)) {
      complexity++;
    }
    // conditional expressions, comprehension clauses and boolean operators
    const rest = line.keyword !== null ? line.code.slice(line.keyword.length) : line.code;
    complexity += countMatches(rest, /\b(?:if|for|and|or)\b/g);
  }
  return complexity;
}

export const structureRules: Rule[] = [
  {
    id: "long-function",
    title: "Long Function",
    category: "structure",
    severity: "high",
    description: "Function body is longer than maxFunctionLength lines",
    check: ({ source, thresholds }) =>
      functions(source)
        .filter(({ element }) => elementLength(element) > thresholds.maxFunctionLength)
        .map(({ element }) => ({
          line: element.startLine,
          message: `Function '${element.name}' is ${elementLength(element)} lines (>${thresholds.maxFunctionLength})`,
          suggestion: "Split it into smaller functions that each do one thing",
        })),
  },
  {
    id: "long-function-warning",
    title: "Long Function",
    category: "structure",
    severity: "medium",
    description: "Function body is longer than warnFunctionLength lines",
    check: ({ source, thresholds }) =>
      functions(source)
        .filter(({ element }) => {
          const length = elementLength(element);
          return length > thresholds.warnFunctionLength && length <= thresholds.maxFunctionLength;
        })
        .map(({ element }) => ({
          line: element.startLine,
          message: `Function '${element.name}' is ${elementLength(element)} lines (>${thresholds.warnFunctionLength})`,
          suggestion: "Consider extracting helper functions",
        })),
  },
  {
    id: "deep-nesting",
    title: "Deep Nesting",
    category: "structure",
    severity: "medium",
    description: "Control blocks nested deeper than maxNestingDepth",
    check: ({ source, thresholds }) =>
      functions(source).flatMap(({ element, index }) => {
        const depth = Math.max(0, ...ownLines(source, index).map((l) => controlParents(source, l).length));
        if (depth <= thresholds.maxNestingDepth) {
          return [];
        }
        return [{
          line: element.startLine,
          message: `Function '${element.name}' nests control blocks ${depth} levels deep (>${thresholds.maxNestingDepth})`,
          suggestion: "Use early returns or extract the inner blocks",
        }];
      }),
  },
  {
    id: "high-complexity",
    title: "High Complexity",
    category: "structure",
    severity: "medium",
    description: "Cyclomatic complexity above maxComplexity",
    check: ({ source, thresholds }) =>
      functions(source).flatMap(({ element, index }) => {
        const complexity = cyclomaticComplexity(ownLines(source, index));
        if (complexity <= thresholds.maxComplexity) {
          return [];
        }
        return [{
          line: element.startLine,
          message: `Function '${element.name}' has cyclomatic complexity ${complexity} (>${thresholds.maxComplexity})`,
          suggestion: "Break the decision logic into smaller functions",
        }];
      }),
  },
  {
    id: "large-class",
    title: "Large Class",
    category: "structure",
    severity: "medium",
    description: "Class defines more methods than maxClassMethods, a sign of mixed responsibilities",
    check: ({ source, thresholds }) =>
      source.elements.flatMap((element, index) => {
        if (element.kind !== "class") {
          return [];
        }
        const methods = source.elements.filter((e) => e.parent === index && e.kind === "function").length;
        if (methods <= thresholds.maxClassMethods) {
          return [];
        }
        return [{
          line: element.startLine,
          message: `Class '${element.name}' defines ${methods} methods (>${thresholds.maxClassMethods})`,
          suggestion: "Split unrelated responsibilities into separate classes",
        }];
      }),
  },
  {
    id: "duplicate-lines",
    title: "Code Duplication",
    category: "structure",
    severity: "medium",
    description: "The same non-trivial line appears more than twice",
    check: ({ unit }) => {
      const seen = new Map<string, { first: number; count: number }>();
      unit.lines.forEach((line, i) => {
        const stripped = line.trim();
        if (stripped.length <= DUPLICATE_MIN_LENGTH || stripped.startsWith("#")) {
          return;
        }
        const entry = seen.get(stripped);
        if (entry) {
          entry.count++;
        } else {
          seen.set(stripped, { first: i + 1, count: 1 });
        }
      });

      const repeated = Array.from(seen.entries()).filter(([, entry]) => entry.count > DUPLICATE_MAX_OCCURRENCES);
      const [firstRepeated] = repeated;
      if (!firstRepeated) {
        return [];
      }
      const [text, entry] = firstRepeated;
      return [{
        line: entry.first,
        message: `${repeated.length} line(s) repeated more than ${DUPLICATE_MAX_OCCURRENCES} times, e.g. '${text}' (${entry.count}x)`,
        evidence: text,
        suggestion: "Extract the repeated logic into a function",
      }];
    },
  },
];
