import type { Rule, RuleMatch } from "../types";

const SECRET_ASSIGNMENT =
  /(?:^|[^\w])["']?([A-Za-z_]*(?:password|passwd|pwd|secret|api_?key|token|access_?key|private_?key|credential)s?)["']?\s*(?::\s*[A-Za-z_][\w[\], ]*)?[:=]\s*[rRbBuU]?(["'])([^"'\n]+)\2/i;
const TOKEN_SHAPED = /(["'])((?:AKIA|ASIA)[0-9A-Z]{16}|gh[pousr]_[A-Za-z0-9]{36,}|sk_live_[A-Za-z0-9]{16,}|xox[baprs]-[A-Za-z0-9-]{10,})\1/;
const LONG_LITERAL = /(["'])([A-Za-z0-9+/=_-]{32,})\1/g;
const ENTROPY_THRESHOLD = 4.5;

const DYNAMIC_EXECUTION = /(?<![\w.])(eval|exec|compile|__import__)\s*\(/;
const SHELL_CALL = /\bos\.(?:system|popen)\s*\(/;
const SUBPROCESS_CALL = /\bsubprocess\.\w+\s*\(/;
const PATH_CALL = /(?<![\w.])(?:open|Path)\s*\(|\bos\.path\.join\s*\(|\bos\.(?:remove|unlink|rmdir|makedirs|listdir)\s*\(|\bshutil\.\w+\s*\(/;
const DYNAMIC_PATH = /["']\s*\+\s*[A-Za-z_(]|[\w)\]]\s*\+\s*[rRbBuU]?["']|(?<![\w.])[fF][rR]?["']|(?<![\w.])[rR][fF]["']|["']\s*%\s*[\w(]|["']\.format\s*\(/;

/** Shannon entropy in bits per character. */
export function shannonEntropy(text: string): number {
  if (text.length === 0) {
    return 0;
  }
  const counts = new Map<string, number>();
  for (const ch of text) {
    counts.set(ch, (counts.get(ch) ?? 0) + 1);
  }
  let entropy = 0;
  for (const count of counts.values()) {
    const p = count / text.length;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

function findSecret(raw: string): string | null {
  const assignment = SECRET_ASSIGNMENT.exec(raw);
  if (assignment) {
    return `'${assignment[1] ?? ""}' is assigned a literal value`;
  }
  if (TOKEN_SHAPED.test(raw)) {
    return "String literal has the shape of an access token";
  }
  for (const literal of raw.matchAll(LONG_LITERAL)) {
    const value = literal[2] ?? "";
    if (/\d/.test(value) && /[A-Za-z]/.test(value) && shannonEntropy(value) >= ENTROPY_THRESHOLD) {
      return "High-entropy string literal looks like a key or token";
    }
  }
  return null;
}

export const securityRules: Rule[] = [
  {
    id: "hardcoded-secret",
    title: "Hardcoded Secret",
    category: "security",
    severity: "critical",
    description: "Password, key or token written directly in the source",
    check: ({ unit }) => {
      const matches: RuleMatch[] = [];
      unit.lines.forEach((raw, i) => {
        if (raw.trim().startsWith("#")) {
          return;
        }
        const finding = findSecret(raw);
        if (finding) {
          matches.push({
            line: i + 1,
            message: `Potential hardcoded secret found: ${finding}`,
            suggestion: "Read it from the environment or a secrets manager",
          });
        }
      });
      return matches;
    },
  },
  {
    id: "dynamic-code-execution",
    title: "Dangerous Function",
    category: "security",
    severity: "high",
    description: "eval/exec/compile/__import__ run code built at runtime",
    check: ({ source }) =>
      source.logicalLines.flatMap((l) => {
        const call = DYNAMIC_EXECUTION.exec(l.code);
        if (!call) {
          return [];
        }
        return [{
          line: l.startLine,
          message: `Use of ${call[1] ?? ""}() is dangerous`,
          evidence: l.code,
          suggestion: "Parse the input explicitly (e.g. ast.literal_eval or a lookup table)",
        }];
      }),
  },
  {
    id: "shell-injection",
    title: "Shell Command Injection",
    category: "security",
    severity: "high",
    description: "Command run through a shell",
    check: ({ source }) =>
      source.logicalLines
        .filter((l) => SHELL_CALL.test(l.code) || (SUBPROCESS_CALL.test(l.code) && /\bshell\s*=\s*True\b/.test(l.code)))
        .map((l) => ({
          line: l.startLine,
          message: "Command is executed through a shell",
          evidence: l.code,
          suggestion: "Pass an argument list to subprocess.run without shell=True",
        })),
  },
  {
    id: "unsafe-path-concatenation",
    title: "Unsafe Path Construction",
    category: "security",
    severity: "medium",
    description: "File path built by string concatenation or formatting",
    check: ({ source }) =>
      source.logicalLines.flatMap((l) => {
        const call = PATH_CALL.exec(l.code);
        if (!call || !DYNAMIC_PATH.test(l.code.slice(call.index + call[0].length))) {
          return [];
        }
        return [{
          line: l.startLine,
          message: "File path is built from unsanitized string concatenation",
          evidence: l.code,
          suggestion: "Join with pathlib and check the resolved path stays inside the base directory",
        }];
      }),
  },
];
