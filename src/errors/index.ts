/**
 * Error module - exports all comparebar error types.
 */

export { ComparebarError } from './base';
export { ColumnNotFoundError } from './column-not-found';
export { TypeMismatchError } from './type-mismatch';
export { ValidationError } from './validation';
