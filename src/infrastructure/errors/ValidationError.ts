/** One violated constraint, scoped to the field that caused it. */
export interface FieldIssue {
  readonly field: string;
  readonly reason: string;
}

/**
 * Field-scoped validation failure.
 * Always carries at least one issue; the message lists all of them as
 * `field: reason` pairs.
 */
export class ValidationError extends Error {
  public readonly issues: readonly [FieldIssue, ...FieldIssue[]];

  constructor(issues: readonly [FieldIssue, ...FieldIssue[]]) {
    super(issues.map(issue => `${issue.field}: ${issue.reason}`).join('; '));
    this.name = 'ValidationError';
    this.issues = issues;
  }

  /** Field of the first issue */
  get field(): string {
    return this.issues[0].field;
  }

  static forField(field: string, reason: string): ValidationError {
    return new ValidationError([{ field, reason }]);
  }
}
