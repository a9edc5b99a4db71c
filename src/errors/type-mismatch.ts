import { ComparebarError } from './base';

/**
 * Error thrown when a field holds a value of an unusable type.
 */
export class TypeMismatchError extends ComparebarError {
  readonly field: string;
  readonly actualType: string;
  readonly expectedTypes: string[];
  readonly rowIndex?: number;

  constructor(field: string, actualType: string, expectedTypes: string[], rowIndex?: number) {
    const expected = expectedTypes.join(' or ');
    const hint = `'${field}' requires ${expected} values`;

    super(`field '${field}' has type ${actualType}, expected ${expected}`, hint);
    this.name = 'TypeMismatchError';
    this.field = field;
    this.actualType = actualType;
    this.expectedTypes = expectedTypes;
    this.rowIndex = rowIndex;
  }

  protected override _getExpression(): string {
    return this.rowIndex === undefined ? `row['${this.field}']` : `data[${this.rowIndex}]['${this.field}']`;
  }

  protected override _getDetails(): string[] {
    return [`cannot use ${this.actualType} value of '${this.field}'`];
  }
}
