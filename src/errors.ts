export class QualityGaugeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised before any analysis runs when a rule configuration cannot be used.
 * `problems` lists every violation found, not only the first one.
 */
export class ConfigurationError extends QualityGaugeError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid rule configuration: ${problems.join("; ")}`);
    this.problems = problems;
  }
}

/** The extractor could not decompose the source into statements. */
export class SourceParseError extends QualityGaugeError {
  readonly line: number;
  readonly reason: string;

  constructor(line: number, reason: string) {
    super(`line ${line}: ${reason}`);
    this.line = line;
    this.reason = reason;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
