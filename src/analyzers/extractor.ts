import type {
  ExtractedSource,
  LogicalLine,
  Parameter,
  SourceMetrics,
  SourceUnit,
  StructuralElement,
} from "./types";
import { type MaskedLine, indentWidth, maskSource } from "./source";
import { SourceParseError } from "../errors";

// Element boundaries come from indentation and bracket depth, not a grammar.
// Good enough for well-formed files; exotic layouts can shift an end line.

const COMPOUND_KEYWORD = /^(async\s+(?:def|for|with)|if|elif|else|for|while|try|except|finally|with|match|case|def|class)\b/;
const DEF_HEADER = /^(?:async\s+)?def\s+([A-Za-z_]\w*)\s*(?:\[[^\]]*\])?\s*\(/;
const CLASS_HEADER = /^class\s+([A-Za-z_]\w*)/;
const STRING_TOKEN = /[rRuUbBfF]{0,2}("""|'''|"|')/g;

type Statement = {
  startLine: number;
  endLine: number;
  indent: number;
  code: string;
};

type BlockFrame = {
  indent: number;
  index: number; // logical line of the header
  element: number; // -1 for control blocks
};

export function extractStructure(unit: SourceUnit): ExtractedSource {
  const masked = maskSource(unit);
  const statements = joinStatements(masked);

  const elements: StructuralElement[] = [];
  const logicalLines: LogicalLine[] = [];
  const stack: BlockFrame[] = [];
  let pendingDecorators: string[] = [];
  let awaitingBody: LogicalLine | null = null;
  let awaitingDocstring = -1;

  for (const stmt of statements) {
    if (awaitingBody && stmt.indent <= awaitingBody.indent) {
      throw new SourceParseError(awaitingBody.startLine, "expected an indented block");
    }
    awaitingBody = null;

    let top = stack[stack.length - 1];
    while (top && top.indent >= stmt.indent) {
      stack.pop();
      top = stack[stack.length - 1];
    }

    const elementFrames = stack.filter((f) => f.element >= 0);
    for (const frame of elementFrames) {
      const el = elements[frame.element];
      if (el) { el.endLine = stmt.endLine; }
    }

    if (awaitingDocstring >= 0) {
      const el = elements[awaitingDocstring];
      if (el) { el.hasDocstring = isStringStatement(stmt.code); }
      awaitingDocstring = -1;
    }

    const owner = elementFrames[elementFrames.length - 1]?.element ?? -1;
    const header = readHeader(stmt);

    const line: LogicalLine = {
      index: logicalLines.length,
      startLine: stmt.startLine,
      endLine: stmt.endLine,
      indent: stmt.indent,
      code: stmt.code,
      keyword: header?.keyword ?? null,
      opensBlock: header !== null && header.inlineBody === "",
      parents: stack.map((f) => f.index),
      owner,
    };
    logicalLines.push(line);

    let elementIndex = -1;
    if (header && (header.keyword.endsWith("def") || header.keyword === "class")) {
      elementIndex = elements.length;
      const parentElement = elements[owner];
      elements.push(buildElement(stmt, header, {
        depth: elementFrames.length,
        parent: owner,
        isMethod: parentElement?.kind === "class",
        decorators: pendingDecorators,
      }));
      if (header.inlineBody === "") {
        awaitingDocstring = elementIndex;
      }
    }

    pendingDecorators = stmt.code.startsWith("@") ? [...pendingDecorators, stmt.code.slice(1).trim()] : [];

    if (line.opensBlock) {
      stack.push({ indent: stmt.indent, index: line.index, element: elementIndex });
      awaitingBody = line;
    }
  }

  if (awaitingBody) {
    throw new SourceParseError(awaitingBody.startLine, "expected an indented block");
  }

  const comments = masked
    .filter((m) => m.comment !== null)
    .map((m) => ({ line: m.number, text: m.comment ?? "" }));

  return {
    elements,
    logicalLines,
    comments,
    metrics: computeMetrics(unit, elements),
  };
}

function joinStatements(masked: MaskedLine[]): Statement[] {
  const statements: Statement[] = [];
  let current: Statement | null = null;

  for (const line of masked) {
    const code = line.code.trim();
    if (current) {
      if (code !== "") {
        current.code += ` ${code}`;
      }
      current.endLine = line.number;
    } else if (code !== "") {
      current = { startLine: line.number, endLine: line.number, indent: indentWidth(line.raw), code };
    }

    if (current && !line.continues) {
      statements.push(current);
      current = null;
    }
  }

  return statements;
}

type Header = {
  keyword: string;
  colon: number;
  inlineBody: string;
};

function readHeader(stmt: Statement): Header | null {
  const match = COMPOUND_KEYWORD.exec(stmt.code);
  if (!match) {
    return null;
  }
  const keyword = (match[1] ?? "").replace(/\s+/, " ");
  const colon = findHeaderColon(stmt.code);
  if (colon < 0) {
    if (keyword.endsWith("def") || keyword === "class") {
      throw new SourceParseError(stmt.startLine, `expected ':' after ${keyword} header`);
    }
    return null; // soft keyword used as a name, e.g. `match = 3`
  }
  return { keyword, colon, inlineBody: stmt.code.slice(colon + 1).trim() };
}

export function findHeaderColon(code: string): number {
  let depth = 0;
  for (let i = 0; i < code.length; i++) {
    const ch = code.charAt(i);
    if (ch === "(" || ch === "[" || ch === "{") {
      depth++;
    } else if (ch === ")" || ch === "]" || ch === "}") {
      depth--;
    } else if (ch === ":" && depth === 0 && code.charAt(i + 1) !== "=") {
      return i;
    }
  }
  return -1;
}

export function isStringStatement(code: string): boolean {
  return /^[rRuUbBfF]{0,2}["']/.test(code) && code.replace(STRING_TOKEN, "").trim() === "";
}

function buildElement(
  stmt: Statement,
  header: Header,
  placement: { depth: number; parent: number; isMethod: boolean; decorators: string[] },
): StructuralElement {
  const base = {
    startLine: stmt.startLine,
    endLine: stmt.endLine,
    depth: placement.depth,
    parent: placement.parent,
    decorators: placement.decorators,
    hasDocstring: isStringStatement(header.inlineBody),
  };

  const classMatch = CLASS_HEADER.exec(stmt.code);
  if (header.keyword === "class" && classMatch) {
    return {
      ...base,
      name: classMatch[1] ?? "",
      kind: "class",
      hasTypeHints: false,
      params: [],
      isMethod: false,
    };
  }

  const defMatch = DEF_HEADER.exec(stmt.code);
  if (!defMatch) {
    throw new SourceParseError(stmt.startLine, "malformed function header");
  }
  const openParen = defMatch[0].length - 1; // the match ends at the parameter list
  const { params, closeParen } = parseParameters(stmt.code, openParen, stmt.startLine);
  const returnsAnnotated = stmt.code.slice(closeParen + 1, header.colon).includes("->");
  const paramsAnnotated = params.some((p) => p.annotated && p.name !== "self" && p.name !== "cls");

  return {
    ...base,
    name: defMatch[1] ?? "",
    kind: "function",
    hasTypeHints: returnsAnnotated || paramsAnnotated,
    params,
    isMethod: placement.isMethod,
  };
}

function parseParameters(code: string, openParen: number, line: number): { params: Parameter[]; closeParen: number } {
  const pieces: string[] = [];
  let depth = 0;
  let start = openParen + 1;
  let closeParen = -1;

  for (let i = openParen; i < code.length; i++) {
    const ch = code.charAt(i);
    if (ch === "(" || ch === "[" || ch === "{") {
      depth++;
    } else if (ch === ")" || ch === "]" || ch === "}") {
      depth--;
      if (depth === 0) {
        pieces.push(code.slice(start, i));
        closeParen = i;
        break;
      }
    } else if (ch === "," && depth === 1) {
      pieces.push(code.slice(start, i));
      start = i + 1;
    }
  }

  if (closeParen < 0) {
    throw new SourceParseError(line, "unterminated parameter list");
  }

  const params: Parameter[] = [];
  for (const piece of pieces) {
    const text = piece.trim();
    if (text === "" || text === "*" || text === "/") {
      continue;
    }
    const eq = indexAtDepthZero(text, "=");
    const left = eq >= 0 ? text.slice(0, eq) : text;
    const colon = indexAtDepthZero(left, ":");
    const param: Parameter = {
      name: (colon >= 0 ? left.slice(0, colon) : left).replace(/^\*{1,2}/, "").trim(),
      annotated: colon >= 0,
    };
    if (eq >= 0) {
      param.defaultValue = text.slice(eq + 1).trim();
    }
    params.push(param);
  }

  return { params, closeParen };
}

function indexAtDepthZero(text: string, target: string): number {
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === "(" || ch === "[" || ch === "{") {
      depth++;
    } else if (ch === ")" || ch === "]" || ch === "}") {
      depth--;
    } else if (ch === target && depth === 0) {
      return i;
    }
  }
  return -1;
}

export function elementLength(element: StructuralElement): number {
  return element.endLine - element.startLine + 1;
}

function computeMetrics(unit: SourceUnit, elements: StructuralElement[]): SourceMetrics {
  const metrics = lineOnlyMetrics(unit);
  const lengths = elements.filter((e) => e.kind === "function").map(elementLength);
  const total = lengths.reduce((sum, n) => sum + n, 0);

  return {
    ...metrics,
    functionCount: lengths.length,
    classCount: elements.filter((e) => e.kind === "class").length,
    averageFunctionLength: lengths.length > 0 ? Math.round((total / lengths.length) * 100) / 100 : 0,
    maxFunctionLength: lengths.length > 0 ? Math.max(...lengths) : 0,
  };
}

/** Metrics that need no structural read; used as-is when extraction fails. */
export function lineOnlyMetrics(unit: SourceUnit): SourceMetrics {
  let blankLines = 0;
  let commentLines = 0;
  for (const line of unit.lines) {
    const stripped = line.trim();
    if (stripped === "") {
      blankLines++;
    } else if (stripped.startsWith("#")) {
      commentLines++;
    }
  }

  return {
    totalLines: unit.lines.length,
    blankLines,
    commentLines,
    functionCount: 0,
    classCount: 0,
    averageFunctionLength: 0,
    maxFunctionLength: 0,
  };
}
