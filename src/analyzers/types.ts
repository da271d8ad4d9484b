export type Severity = "critical" | "high" | "medium" | "low";

export type CategoryId =
  | "structure"
  | "error-handling"
  | "performance"
  | "security"
  | "maintainability"
  | "best-practices";

export type SourceUnit = {
  readonly name: string;
  readonly text: string;
  readonly lines: readonly string[]; // line N is lines[N - 1]
};

export type ElementKind = "function" | "class";

export type Parameter = {
  name: string;
  annotated: boolean;
  defaultValue?: string; // masked source text of the default
};

export type StructuralElement = {
  name: string;
  kind: ElementKind;
  startLine: number;
  endLine: number;
  depth: number; // number of enclosing functions/classes
  hasDocstring: boolean;
  hasTypeHints: boolean;
  params: Parameter[];
  decorators: string[];
  parent: number; // index into the element list, -1 at module level
  isMethod: boolean;
};

/**
 * One statement, possibly spanning several physical lines. `code` has string
 * contents and comments removed, continuation lines joined by a space.
 */
export type LogicalLine = {
  index: number;
  startLine: number;
  endLine: number;
  indent: number;
  code: string;
  keyword: string | null; // compound statement keyword when this is a block header
  opensBlock: boolean; // header whose body starts on the next statement
  parents: number[]; // logical indexes of enclosing block headers, outermost first
  owner: number; // innermost element whose body holds this line, -1 at module level
};

export type SourceMetrics = {
  totalLines: number;
  blankLines: number;
  commentLines: number;
  functionCount: number;
  classCount: number;
  averageFunctionLength: number;
  maxFunctionLength: number;
};

export type ExtractedSource = {
  elements: StructuralElement[];
  logicalLines: LogicalLine[];
  comments: { line: number; text: string }[];
  metrics: SourceMetrics;
};

export type Thresholds = {
  maxFunctionLength: number;
  warnFunctionLength: number;
  maxComplexity: number;
  maxNestingDepth: number;
  maxClassMethods: number;
  maxLineLength: number;
  requireDocstrings: boolean;
  requireTypeHints: boolean;
};

export type RuleContext = {
  unit: SourceUnit;
  source: ExtractedSource;
  thresholds: Thresholds;
};

export type RuleMatch = {
  line: number; // 0 for file-level matches
  message: string;
  evidence?: string;
  suggestion?: string;
};

export type Rule = {
  id: string;
  title: string;
  category: CategoryId;
  severity: Severity;
  description: string;
  check: (context: RuleContext) => RuleMatch[];
};

export type Issue = {
  ruleId: string;
  title: string;
  category: CategoryId;
  severity: Severity;
  line: number;
  message: string;
  evidence?: string;
  suggestion?: string;
};

export type CategoryDefinition = {
  id: CategoryId;
  name: string;
  weight: number;
};

export type CategoryScore = {
  category: CategoryId;
  name: string;
  weight: number;
  score: number; // 0-10
  issueCount: number;
};

export type VerdictLevel = "not-ready" | "poor" | "fair" | "good" | "excellent";

export type Verdict = {
  level: VerdictLevel;
  label: string;
  productionReady: boolean;
  criticalCount: number;
  highCount: number;
};

export type SeverityCounts = Record<Severity, number>;

export type QualityReport = {
  source: string;
  overall: number; // 0-10
  categories: CategoryScore[];
  issues: Issue[];
  counts: SeverityCounts;
  metrics: SourceMetrics;
  verdict: Verdict;
};
