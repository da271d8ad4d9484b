import { describe, it } from "node:test";
import assert from "node:assert";

import { issuesFor, py } from "./helpers";

describe("bare-except", () => {
  it("flags except clauses without an exception type", () => {
    const text = py(
      "try:",
      "    run()",
      "except:",
      "    pass",
      "try:",
      "    run()",
      "except BaseException:",
      "    pass",
      "try:",
      "    run()",
      "except ValueError:",
      "    pass",
    );
    const issues = issuesFor("bare-except", text);
    assert.deepStrictEqual(issues.map((i) => [i.severity, i.line]), [["high", 3], ["high", 7]]);
    assert.strictEqual(issues[0]?.message, "Using bare except: catches all exceptions including system exits");
  });
});

describe("unguarded-io", () => {
  it("flags I/O calls outside any try block", () => {
    const issues = issuesFor("unguarded-io", py("data = open(\"x.txt\").read()"));
    assert.deepStrictEqual(issues.map((i) => [i.severity, i.line, i.message]), [
      ["medium", 1, "I/O call 'open()' is not inside a try block"],
    ]);
  });

  it("accepts calls inside a try block", () => {
    const text = py(
      "def fetch(url):",
      "    try:",
      "        return requests.get(url)",
      "    except requests.RequestException:",
      "        return None",
    );
    assert.deepStrictEqual(issuesFor("unguarded-io", text), []);
  });

  it("does not let a try around a def guard the function body", () => {
    const text = py(
      "try:",
      "    def load(path):",
      "        return open(path)",
      "except OSError:",
      "    pass",
    );
    assert.deepStrictEqual(issuesFor("unguarded-io", text).map((i) => i.line), [3]);
  });

  it("treats a one-line try as guarding its inline body", () => {
    const text = py(
      "def read(p):",
      "    try: return open(p).read()",
      "    except OSError: return \"\"",
    );
    assert.deepStrictEqual(issuesFor("unguarded-io", text), []);
  });

  it("ignores methods that merely share a name", () => {
    assert.deepStrictEqual(issuesFor("unguarded-io", py("door.open()")), []);
  });
});

describe("missing-cleanup", () => {
  it("flags a resource that is never closed", () => {
    const issues = issuesFor("missing-cleanup", py("fh = open(path)", "data = fh.read()"));
    assert.deepStrictEqual(issues.map((i) => [i.line, i.message]), [
      [1, "'fh' is opened with open() but never closed"],
    ]);
  });

  it("accepts a resource closed later in the file", () => {
    const text = py("fh = open(path)", "data = fh.read()", "fh.close()");
    assert.deepStrictEqual(issuesFor("missing-cleanup", text), []);
  });

  it("accepts a with statement", () => {
    const text = py("with open(path) as fh:", "    data = fh.read()");
    assert.deepStrictEqual(issuesFor("missing-cleanup", text), []);
  });

  it("flags a lock that is never released", () => {
    const issues = issuesFor("missing-cleanup", py("lock.acquire()", "work()"));
    assert.deepStrictEqual(issues.map((i) => [i.line, i.message]), [
      [1, "'lock' is acquired but never released"],
    ]);
    assert.deepStrictEqual(issuesFor("missing-cleanup", py("lock.acquire()", "work()", "lock.release()")), []);
  });
});

describe("no-error-handling", () => {
  it("reports a file-level issue when functions exist but no try does", () => {
    const issues = issuesFor("no-error-handling", py("def f():", "    return 1"));
    assert.deepStrictEqual(issues.map((i) => [i.severity, i.line, i.message]), [
      ["medium", 0, "No try/except blocks found in a file that defines 1 function(s)"],
    ]);
  });

  it("stays quiet for files without functions", () => {
    assert.deepStrictEqual(issuesFor("no-error-handling", py("x = 1")), []);
  });
});
