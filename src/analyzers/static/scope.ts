import type { ExtractedSource, LogicalLine, StructuralElement } from "../types";
import { findHeaderColon } from "../extractor";

const ELEMENT_KEYWORDS = new Set(["def", "async def", "class"]);

export function isElementHeader(line: LogicalLine | undefined): boolean {
  return line !== undefined && line.keyword !== null && ELEMENT_KEYWORDS.has(line.keyword);
}

export function functions(source: ExtractedSource): { element: StructuralElement; index: number }[] {
  return source.elements
    .map((element, index) => ({ element, index }))
    .filter(({ element }) => element.kind === "function");
}

/** Statements that belong to the element itself, excluding nested functions and classes. */
export function ownLines(source: ExtractedSource, index: number): LogicalLine[] {
  return source.logicalLines.filter((l) => l.owner === index);
}

/** Control blocks (if/for/try/...) enclosing a line, innermost function boundary excluded. */
export function controlParents(source: ExtractedSource, line: LogicalLine): LogicalLine[] {
  const chain: LogicalLine[] = [];
  for (const index of line.parents) {
    const parent = source.logicalLines[index];
    if (!parent) {
      continue;
    }
    if (isElementHeader(parent)) {
      chain.length = 0;
    } else {
      chain.push(parent);
    }
  }
  return chain;
}

/** Direct and indirect body statements of a block header. */
export function bodyOf(source: ExtractedSource, header: LogicalLine): LogicalLine[] {
  return source.logicalLines.filter((l) => l.parents.includes(header.index));
}

/** Code after the header's colon, for one-line compound statements. */
export function inlineBody(line: LogicalLine): string {
  const colon = findHeaderColon(line.code);
  return colon >= 0 ? line.code.slice(colon + 1).trim() : "";
}

export function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
