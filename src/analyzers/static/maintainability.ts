import type { Rule, StructuralElement } from "../types";

const SNAKE_CASE = /^_{0,2}[a-z][a-z0-9_]*$/;
const DUNDER = /^__\w+__$/;
const CAP_WORDS = /^_{0,2}[A-Z][A-Za-z0-9]*$/;
// unittest hooks are camelCase by necessity
const FRAMEWORK_HOOKS = new Set([
  "setUp", "tearDown", "setUpClass", "tearDownClass", "setUpModule", "tearDownModule",
  "asyncSetUp", "asyncTearDown", "addCleanup",
]);
const TODO_MARKER = /\b(TODO|FIXME|HACK|XXX)\b/;

function isPublic(element: StructuralElement): boolean {
  return !element.name.startsWith("_");
}

export const maintainabilityRules: Rule[] = [
  {
    id: "missing-class-docstring",
    title: "Missing Docstring",
    category: "maintainability",
    severity: "medium",
    description: "Public class without a docstring",
    check: ({ source, thresholds }) => {
      if (!thresholds.requireDocstrings) {
        return [];
      }
      return source.elements
        .filter((e) => e.kind === "class" && isPublic(e) && !e.hasDocstring)
        .map((e) => ({
          line: e.startLine,
          message: `Class '${e.name}' has no docstring`,
          suggestion: "Describe what the class is responsible for",
        }));
    },
  },
  {
    id: "missing-function-docstring",
    title: "Missing Docstring",
    category: "maintainability",
    severity: "low",
    description: "Public function or method without a docstring",
    check: ({ source, thresholds }) => {
      if (!thresholds.requireDocstrings) {
        return [];
      }
      return source.elements
        .filter((e) => {
          if (e.kind !== "function" || !isPublic(e) || e.hasDocstring) {
            return false;
          }
          // closures are implementation details of their parent
          return source.elements[e.parent]?.kind !== "function";
        })
        .map((e) => ({
          line: e.startLine,
          message: `Function '${e.name}' has no docstring`,
          suggestion: "Add a docstring describing arguments and return value",
        }));
    },
  },
  {
    id: "missing-type-hints",
    title: "Missing Type Hints",
    category: "maintainability",
    severity: "low",
    description: "Function signature without any annotation",
    check: ({ source, thresholds }) => {
      if (!thresholds.requireTypeHints) {
        return [];
      }
      return source.elements
        .filter((e) => e.kind === "function" && !e.hasTypeHints)
        .map((e) => ({
          line: e.startLine,
          message: `Function '${e.name}' has no type hints`,
          suggestion: "Annotate the parameters and the return type",
        }));
    },
  },
  {
    id: "naming-convention",
    title: "Naming Convention",
    category: "maintainability",
    severity: "low",
    description: "Function not in snake_case or class not in CapWords",
    check: ({ source }) =>
      source.elements.flatMap((e) => {
        if (e.kind === "function") {
          if (SNAKE_CASE.test(e.name) || DUNDER.test(e.name) || FRAMEWORK_HOOKS.has(e.name)) {
            return [];
          }
          return [{
            line: e.startLine,
            message: `Function '${e.name}' should use snake_case`,
            suggestion: `Rename to '${toSnakeCase(e.name)}'`,
          }];
        }
        if (CAP_WORDS.test(e.name)) {
          return [];
        }
        return [{
          line: e.startLine,
          message: `Class '${e.name}' should use CapWords`,
        }];
      }),
  },
  {
    id: "todo-comment",
    title: "Unresolved TODO",
    category: "maintainability",
    severity: "low",
    description: "TODO/FIXME/HACK/XXX marker left in a comment",
    check: ({ source }) =>
      source.comments
        .filter((c) => TODO_MARKER.test(c.text))
        .map((c) => ({
          line: c.line,
          message: `Unresolved marker: ${c.text.replace(/^#\s*/, "").trim()}`,
          evidence: c.text,
        })),
  },
];

export function toSnakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .toLowerCase();
}
