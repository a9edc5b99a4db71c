import { ComparebarError } from './base';

/**
 * Error thrown when a row lacks one of the named fields.
 */
export class ColumnNotFoundError extends ComparebarError {
  readonly column: string;
  readonly available: string[];
  readonly rowIndex?: number;

  constructor(column: string, available: string[], rowIndex?: number) {
    const hint = available.length > 0
      ? `available fields are: ${available.map(c => `'${c}'`).join(', ')}`
      : 'row has no fields';

    super(`field '${column}' not found`, hint);
    this.name = 'ColumnNotFoundError';
    this.column = column;
    this.available = available;
    this.rowIndex = rowIndex;
  }

  protected override _getExpression(): string {
    return this.rowIndex === undefined ? `row['${this.column}']` : `data[${this.rowIndex}]['${this.column}']`;
  }

  protected override _getDetails(): string[] {
    return [`field '${this.column}' does not exist on the row`];
  }
}
