export interface ConfigurationIssue {
  path: string;
  message: string;
}

export class ConfigurationError extends Error {
  readonly issues: ConfigurationIssue[];

  constructor(issues: ConfigurationIssue[]) {
    super(
      issues.length === 1
        ? `Invalid configuration: ${describeIssue(issues[0])}`
        : `Invalid configuration (${issues.length} issues): ${issues.map(describeIssue).join("; ")}`
    );
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolation";
  }
}

export function assertInvariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message);
  }
}

function describeIssue(issue: ConfigurationIssue): string {
  return issue.path ? `${issue.path}: ${issue.message}` : issue.message;
}
