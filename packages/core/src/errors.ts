export interface ConfigValidationIssue {
  field: string;
  message: string;
}

/**
 * Fatal setup problem detected before any translation work is dispatched.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: ConfigValidationIssue[] = [],
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }

  static fromIssues(issues: ConfigValidationIssue[]): ConfigurationError {
    const details = issues.map((issue) => `  • ${issue.field}: ${issue.message}`).join('\n');
    return new ConfigurationError(`Invalid transjson configuration:\n${details}`, issues);
  }
}

export class DetectionError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'DetectionError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : JSON.stringify(error);
}
