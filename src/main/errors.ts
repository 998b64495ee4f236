export interface ValidationIssue {
  /** Where the problem is, e.g. "clips[2].keyTime" */
  path: string;
  message: string;
}

/**
 * Bad planner input. Thrown before any planning happens and never retried.
 */
export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const head = issues[0];
    const summary = head ? `${head.path}: ${head.message}` : 'invalid input';
    const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : '';
    super(`Invalid timeline input: ${summary}${more}`);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * A montage manifest that cannot be read or does not match the schema.
 */
export class ManifestError extends Error {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = 'ManifestError';
    this.issues = issues;
  }
}

export class ExportCancelledError extends Error {
  constructor() {
    super('Export cancelled');
    this.name = 'ExportCancelledError';
  }
}

export function formatIssues(issues: ValidationIssue[]): string {
  return issues.map((issue) => `${issue.path}: ${issue.message}`).join('\n');
}
