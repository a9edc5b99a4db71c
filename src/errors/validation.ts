import { ComparebarError } from './base';

/**
 * Error thrown when the arguments of a chart call are missing or out of range.
 * Every problem found in one validation pass is carried in `issues`.
 */
export class ValidationError extends ComparebarError {
  readonly operation: string;
  readonly issues: string[];

  constructor(operation: string, issues: string[], hint?: string) {
    super(issues.join('; '), hint);
    this.name = 'ValidationError';
    this.operation = operation;
    this.issues = issues;
  }

  protected override _getExpression(): string {
    return `${this.operation}(...)`;
  }

  protected override _getDetails(): string[] {
    return this.issues;
  }
}
