import type { SourceUnit } from "./types";
import { SourceParseError } from "../errors";

export function createSourceUnit(name: string, text: string): SourceUnit {
  return Object.freeze({
    name,
    text,
    lines: Object.freeze(splitLines(text)),
  });
}

export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

export type MaskedLine = {
  number: number;
  raw: string;
  code: string; // string contents and comment removed
  comment: string | null;
  continues: boolean; // the statement carries on to the next physical line
};

const OPENERS: Record<string, string> = { "(": ")", "[": "]", "{": "}" };
const CLOSERS = new Set([")", "]", "}"]);

/**
 * Tokenizes just enough of the source to blank out string literals and comments
 * and to track bracket balance across lines. Throws SourceParseError when the
 * text cannot be split into statements.
 */
export function maskSource(unit: SourceUnit): MaskedLine[] {
  const masked: MaskedLine[] = [];
  const brackets: { char: string; line: number }[] = [];
  let openString: { quote: string; line: number } | null = null;

  for (const [i, raw] of unit.lines.entries()) {
    const number = i + 1;
    if (/[\u0000\uFFFD]/.test(raw)) {
      throw new SourceParseError(number, "source contains undecodable characters");
    }

    let code = "";
    let comment: string | null = null;
    let escapedNewline = false;
    let explicitJoin = false;
    let j = 0;

    while (j < raw.length) {
      const ch = raw.charAt(j);

      if (openString) {
        if (ch === "\\") {
          if (j === raw.length - 1) { escapedNewline = true; }
          j += 2;
          continue;
        }
        if (raw.startsWith(openString.quote, j)) {
          code += openString.quote;
          j += openString.quote.length;
          openString = null;
          continue;
        }
        j++;
        continue;
      }

      if (ch === "#") {
        comment = raw.slice(j);
        break;
      }

      if (ch === "\"" || ch === "'") {
        const quote = raw.startsWith(ch.repeat(3), j) ? ch.repeat(3) : ch;
        openString = { quote, line: number };
        code += quote;
        j += quote.length;
        continue;
      }

      if (ch === "\\" && j === raw.length - 1) {
        explicitJoin = true;
        j++;
        continue;
      }

      const closer = OPENERS[ch];
      if (closer !== undefined) {
        brackets.push({ char: ch, line: number });
      } else if (CLOSERS.has(ch)) {
        const top = brackets.pop();
        if (!top || OPENERS[top.char] !== ch) {
          throw new SourceParseError(number, `unmatched '${ch}'`);
        }
      }
      code += ch;
      j++;
    }

    if (openString && openString.quote.length === 1 && !escapedNewline) {
      throw new SourceParseError(openString.line, "unterminated string literal");
    }

    masked.push({
      number,
      raw,
      code,
      comment,
      continues: openString !== null || brackets.length > 0 || explicitJoin,
    });
  }

  if (openString) {
    throw new SourceParseError(openString.line, "unterminated string literal");
  }
  const unclosed = brackets[0];
  if (unclosed) {
    throw new SourceParseError(unclosed.line, `'${unclosed.char}' was never closed`);
  }

  return masked;
}

export function indentWidth(raw: string): number {
  let width = 0;
  for (const ch of raw) {
    if (ch === " ") {
      width++;
    } else if (ch === "\t") {
      width += 8 - (width % 8);
    } else if (ch === "\f") {
      width = 0;
    } else {
      break;
    }
  }
  return width;
}
