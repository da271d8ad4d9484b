import type { ExtractedSource, LogicalLine, Rule, RuleMatch } from "../types";
import { findHeaderColon } from "../extractor";
import { bodyOf, inlineBody } from "./scope";

const APPEND_CALL = /^[A-Za-z_][\w.]*\.append\s*\(/;
const LOOP_TARGET = /^(?:async\s+)?for\s+.+?\s+in\s+(.+)$/;

function isForLoop(line: LogicalLine): boolean {
  return line.keyword === "for" || line.keyword === "async for";
}

/** The iterable expression of a for header, whitespace-normalized. */
export function loopIterable(line: LogicalLine): string | null {
  const colon = findHeaderColon(line.code);
  const match = LOOP_TARGET.exec(colon >= 0 ? line.code.slice(0, colon) : line.code);
  return match?.[1]?.replace(/\s+/g, "") ?? null;
}

function isAccumulationLoop(source: ExtractedSource, loop: LogicalLine): boolean {
  if (!loop.opensBlock) {
    return APPEND_CALL.test(inlineBody(loop));
  }
  const body = bodyOf(source, loop);
  const [first, second] = body;
  if (!first) {
    return false;
  }
  if (body.length === 1) {
    return APPEND_CALL.test(first.code) || (first.keyword === "if" && APPEND_CALL.test(inlineBody(first)));
  }
  // `if cond:` guarding a single append is a filtered comprehension
  return body.length === 2 && first.keyword === "if" && first.opensBlock && second !== undefined && APPEND_CALL.test(second.code);
}

export const performanceRules: Rule[] = [
  {
    id: "comprehension-opportunity",
    title: "List Comprehension Opportunity",
    category: "performance",
    severity: "low",
    description: "Loop whose only job is appending to a list",
    check: ({ source }) =>
      source.logicalLines
        .filter((l) => isForLoop(l) && isAccumulationLoop(source, l))
        .map((l) => ({
          line: l.startLine,
          message: "Consider using list comprehension",
          evidence: l.code,
          suggestion: "Build the list with [expr for item in iterable if cond]",
        })),
  },
  {
    id: "nested-loop-same-collection",
    title: "Quadratic Loop",
    category: "performance",
    severity: "medium",
    description: "Nested loops iterating over the same collection",
    check: ({ source }) => {
      const matches: RuleMatch[] = [];
      for (const inner of source.logicalLines) {
        if (!isForLoop(inner)) {
          continue;
        }
        const iterable = loopIterable(inner);
        if (iterable === null) {
          continue;
        }
        const outer = inner.parents
          .map((index) => source.logicalLines[index])
          .find((p) => p !== undefined && isForLoop(p) && loopIterable(p) === iterable);
        if (outer) {
          matches.push({
            line: inner.startLine,
            message: `Nested loop over '${iterable}' (outer loop on line ${outer.startLine}) is O(n²)`,
            evidence: inner.code,
            suggestion: "Index the collection in a dict or set before looping",
          });
        }
      }
      return matches;
    },
  },
];
