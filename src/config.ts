import * as fs from "fs";
import { z } from "zod";
import type { CategoryDefinition, CategoryId, Severity, Thresholds } from "./analyzers/types";
import { ConfigurationError, describeError } from "./errors";

export const SEVERITIES: Severity[] = ["critical", "high", "medium", "low"];

export const categories: CategoryDefinition[] = [
  { id: "structure", name: "Structure", weight: 0.2 },
  { id: "error-handling", name: "Error Handling", weight: 0.2 },
  { id: "performance", name: "Performance", weight: 0.15 },
  { id: "security", name: "Security", weight: 0.15 },
  { id: "maintainability", name: "Maintainability", weight: 0.15 },
  { id: "best-practices", name: "Best Practices", weight: 0.15 },
];

export const thresholds: Thresholds = {
  maxFunctionLength: 100,
  warnFunctionLength: 50,
  maxComplexity: 10,
  maxNestingDepth: 4,
  maxClassMethods: 20,
  maxLineLength: 120,
  requireDocstrings: true,
  requireTypeHints: true,
};

// Points taken off a category's 10.0 baseline per issue.
export const deductions: Record<Severity, number> = {
  critical: 4.0,
  high: 2.0,
  medium: 1.0,
  low: 0.3,
};

export const WEIGHT_TOLERANCE = 1e-9;

const severitySchema = z.enum(["critical", "high", "medium", "low"]);

const severityDeductionsSchema = z.object({
  critical: z.number().finite().nonnegative().optional(),
  high: z.number().finite().nonnegative().optional(),
  medium: z.number().finite().nonnegative().optional(),
  low: z.number().finite().nonnegative().optional(),
}).strict();

function perCategory<T extends z.ZodTypeAny>(schema: T) {
  return z.object({
    structure: schema.optional(),
    "error-handling": schema.optional(),
    performance: schema.optional(),
    security: schema.optional(),
    maintainability: schema.optional(),
    "best-practices": schema.optional(),
  }).strict();
}

export const ruleConfigurationSchema = z.object({
  rules: z.record(
    z.string(),
    z.object({
      enabled: z.boolean().optional(),
      severity: severitySchema.optional(),
    }).strict(),
  ).optional(),
  thresholds: z.object({
    maxFunctionLength: z.number().int().positive().optional(),
    warnFunctionLength: z.number().int().positive().optional(),
    maxComplexity: z.number().int().positive().optional(),
    maxNestingDepth: z.number().int().positive().optional(),
    maxClassMethods: z.number().int().positive().optional(),
    maxLineLength: z.number().int().positive().optional(),
    requireDocstrings: z.boolean().optional(),
    requireTypeHints: z.boolean().optional(),
  }).strict().optional(),
  weights: perCategory(z.number().finite()).optional(),
  deductions: severityDeductionsSchema.extend({
    categories: perCategory(severityDeductionsSchema).optional(),
  }).strict().optional(),
}).strict();

export type RuleConfiguration = z.infer<typeof ruleConfigurationSchema>;

export type RuleSetting = {
  enabled: boolean;
  severity: Severity;
};

export type DeductionPolicy = Record<CategoryId, Record<Severity, number>>;

export type ResolvedConfiguration = {
  thresholds: Thresholds;
  categories: CategoryDefinition[];
  deductions: DeductionPolicy;
  rules: Map<string, RuleSetting>;
};

/** Validates an untyped value (e.g. parsed JSON) against the configuration schema. */
export function parseRuleConfiguration(input: unknown): RuleConfiguration {
  const result = ruleConfigurationSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return result.data;
}

export function loadConfigFile(filePath: string): RuleConfiguration {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigurationError([`cannot read ${filePath}: ${describeError(error)}`]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError([`${filePath} is not valid JSON: ${describeError(error)}`]);
  }
  return parseRuleConfiguration(parsed);
}

/**
 * Merges a configuration onto the defaults. `rules` maps every known rule id to
 * its default severity. Collects every problem before throwing.
 */
export function resolveConfiguration(
  input: RuleConfiguration | undefined,
  rules: Map<string, Severity>,
): ResolvedConfiguration {
  const config = parseRuleConfiguration(input ?? {});
  const problems: string[] = [];

  const overrides = config.thresholds ?? {};
  const resolvedThresholds: Thresholds = {
    maxFunctionLength: overrides.maxFunctionLength ?? thresholds.maxFunctionLength,
    warnFunctionLength: overrides.warnFunctionLength ?? thresholds.warnFunctionLength,
    maxComplexity: overrides.maxComplexity ?? thresholds.maxComplexity,
    maxNestingDepth: overrides.maxNestingDepth ?? thresholds.maxNestingDepth,
    maxClassMethods: overrides.maxClassMethods ?? thresholds.maxClassMethods,
    maxLineLength: overrides.maxLineLength ?? thresholds.maxLineLength,
    requireDocstrings: overrides.requireDocstrings ?? thresholds.requireDocstrings,
    requireTypeHints: overrides.requireTypeHints ?? thresholds.requireTypeHints,
  };
  if (resolvedThresholds.warnFunctionLength > resolvedThresholds.maxFunctionLength) {
    problems.push(
      `thresholds.warnFunctionLength (${resolvedThresholds.warnFunctionLength}) exceeds maxFunctionLength (${resolvedThresholds.maxFunctionLength})`,
    );
  }

  const resolvedCategories = categories.map((cat) => ({
    ...cat,
    weight: config.weights?.[cat.id] ?? cat.weight,
  }));
  for (const cat of resolvedCategories) {
    if (!(cat.weight > 0 && cat.weight <= 1)) {
      problems.push(`weights.${cat.id} must be in (0, 1], got ${cat.weight}`);
    }
  }
  const weightSum = resolvedCategories.reduce((sum, cat) => sum + cat.weight, 0);
  if (Math.abs(weightSum - 1) > WEIGHT_TOLERANCE) {
    problems.push(`category weights must sum to 1.0, got ${weightSum}`);
  }

  const deductionsFor = (id: CategoryId): Record<Severity, number> => {
    const own = config.deductions?.categories?.[id];
    return {
      critical: own?.critical ?? config.deductions?.critical ?? deductions.critical,
      high: own?.high ?? config.deductions?.high ?? deductions.high,
      medium: own?.medium ?? config.deductions?.medium ?? deductions.medium,
      low: own?.low ?? config.deductions?.low ?? deductions.low,
    };
  };
  const resolvedDeductions: DeductionPolicy = {
    structure: deductionsFor("structure"),
    "error-handling": deductionsFor("error-handling"),
    performance: deductionsFor("performance"),
    security: deductionsFor("security"),
    maintainability: deductionsFor("maintainability"),
    "best-practices": deductionsFor("best-practices"),
  };

  const resolvedRules = new Map<string, RuleSetting>();
  for (const [id, severity] of rules) {
    const override = config.rules?.[id];
    resolvedRules.set(id, {
      enabled: override?.enabled ?? true,
      severity: override?.severity ?? severity,
    });
  }
  for (const id of Object.keys(config.rules ?? {})) {
    if (!rules.has(id)) {
      problems.push(`rules.${id}: unknown rule identifier`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  return {
    thresholds: resolvedThresholds,
    categories: resolvedCategories,
    deductions: resolvedDeductions,
    rules: resolvedRules,
  };
}
