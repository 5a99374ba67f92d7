/** Path-addressed problem found while validating a configuration */
export interface ValidationIssue {
  path: string;
  message: string;
}

function formatIssues(issues: readonly ValidationIssue[]): string {
  return issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
}

/**
 * Invalid construction parameters. Thrown before anything is built, so a
 * failed constructor never leaves a half-initialized system behind.
 */
export class ConfigError extends Error {
  public readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[]) {
    super(`Invalid particle configuration: ${formatIssues(issues)}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class InvalidCurveError extends ConfigError {
  constructor(issues: readonly ValidationIssue[]) {
    super(issues);
    this.name = 'InvalidCurveError';
  }
}

/** Negative or non-finite frame delta passed to update() */
export class InvalidTimestepError extends Error {
  public readonly dt: number;

  constructor(dt: number) {
    super(`Invalid timestep ${dt}: dt must be finite and >= 0`);
    this.name = 'InvalidTimestepError';
    this.dt = dt;
  }
}
