import type { Rule, RuleMatch } from "../types";
import { controlParents, escapeRegExp } from "./scope";

const IO_CALL = new RegExp([
  /(?<![\w.])(?:open|urlopen)\s*\(/.source,
  /\burllib\.request\.urlopen\s*\(/.source,
  /\brequests\.(?:get|post|put|patch|delete|head|request)\s*\(/.source,
  /\bsocket\.create_connection\s*\(/.source,
  /\bsubprocess\.(?:run|call|check_call|check_output|Popen)\s*\(/.source,
  /\b(?:json|pickle|yaml)\.load\s*\(/.source,
  /\bos\.(?:remove|unlink|rename|makedirs|mkdir|rmdir)\s*\(/.source,
  /\bshutil\.(?:copy|copy2|copyfile|copytree|move|rmtree)\s*\(/.source,
].join("|"));

const ACQUIRE_ASSIGNMENT = /^([A-Za-z_][\w.]*)\s*=\s*(open|socket\.socket|sqlite3\.connect|psycopg2\.connect|urllib\.request\.urlopen|urlopen|zipfile\.ZipFile|tarfile\.open|tempfile\.(?:TemporaryFile|NamedTemporaryFile))\s*\(/;
const LOCK_ACQUIRE = /([A-Za-z_][\w.]*)\.acquire\s*\(/;

export const errorHandlingRules: Rule[] = [
  {
    id: "bare-except",
    title: "Bare Except Clause",
    category: "error-handling",
    severity: "high",
    description: "except clause that catches everything, including SystemExit and KeyboardInterrupt",
    check: ({ source }) =>
      source.logicalLines
        .filter((l) => l.keyword === "except" && /^except\s*(?::|\(?\s*BaseException\b)/.test(l.code))
        .map((l) => ({
          line: l.startLine,
          message: "Using bare except: catches all exceptions including system exits",
          evidence: l.code,
          suggestion: "Catch the specific exception types you expect",
        })),
  },
  {
    id: "unguarded-io",
    title: "Unguarded I/O",
    category: "error-handling",
    severity: "medium",
    description: "File, network or process I/O outside any try block",
    check: ({ source }) => {
      const matches: RuleMatch[] = [];
      for (const line of source.logicalLines) {
        const call = IO_CALL.exec(line.code);
        if (!call) {
          continue;
        }
        // a one-line `try: ...` guards its own inline body
        const guarded = line.keyword === "try" || controlParents(source, line).some((p) => p.keyword === "try");
        if (!guarded) {
          matches.push({
            line: line.startLine,
            message: `I/O call '${call[0].replace(/\s*\($/, "")}()' is not inside a try block`,
            evidence: line.code,
            suggestion: "Wrap the call in try/except and handle the failure",
          });
        }
      }
      return matches;
    },
  },
  {
    id: "missing-cleanup",
    title: "Missing Resource Cleanup",
    category: "error-handling",
    severity: "medium",
    description: "Resource acquired without a with-statement and never closed or released",
    check: ({ source }) => {
      const matches: RuleMatch[] = [];
      const allCode = source.logicalLines.map((l) => l.code).join("\n");

      for (const line of source.logicalLines) {
        if (line.keyword === "with" || line.keyword === "async with") {
          continue;
        }
        const assignment = ACQUIRE_ASSIGNMENT.exec(line.code);
        const name = assignment?.[1];
        if (assignment && name && !new RegExp(`\\b${escapeRegExp(name)}\\.close\\s*\\(`).test(allCode)) {
          matches.push({
            line: line.startLine,
            message: `'${name}' is opened with ${assignment[2]}() but never closed`,
            evidence: line.code,
            suggestion: `Use 'with ${assignment[2]}(...) as ${name.split(".").pop() ?? name}:' or close it in a finally block`,
          });
          continue;
        }

        const lock = LOCK_ACQUIRE.exec(line.code);
        const lockName = lock?.[1];
        if (lockName && !new RegExp(`\\b${escapeRegExp(lockName)}\\.release\\s*\\(`).test(allCode)) {
          matches.push({
            line: line.startLine,
            message: `'${lockName}' is acquired but never released`,
            evidence: line.code,
            suggestion: `Use 'with ${lockName}:' so the lock is always released`,
          });
        }
      }
      return matches;
    },
  },
  {
    id: "no-error-handling",
    title: "No Error Handling",
    category: "error-handling",
    severity: "medium",
    description: "File defines functions but contains no try/except at all",
    check: ({ source }) => {
      const functionCount = source.elements.filter((e) => e.kind === "function").length;
      if (functionCount === 0 || source.logicalLines.some((l) => l.keyword === "try")) {
        return [];
      }
      return [{
        line: 0,
        message: `No try/except blocks found in a file that defines ${functionCount} function(s)`,
        suggestion: "Handle the failures callers cannot recover from",
      }];
    },
  },
];
