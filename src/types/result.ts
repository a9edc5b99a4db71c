/**
 * Result type for panic-free error handling
 * Represents either a successful value (ok) or an error
 */
export type Result<T, E = Error> = { ok: true; data: T } | { ok: false; error: E };

/**
 * Creates a successful Result
 * @param data - The success value
 */
export function ok<T>(data: T): Result<T, never> {
  return { ok: true, data };
}

/**
 * Creates an error Result
 * @param error - The error value
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Unwraps a Result, returning the data if successful or throwing the error
 * @throws The error if the Result is not ok
 */
export function unwrap<T, E = Error>(result: Result<T, E>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.data;
}

/**
 * Unwraps the error from a Result that is known to be an error
 */
export function unwrapErr<T, E>(result: Result<T, E>): E {
  if (result.ok) {
    throw new Error('Called unwrapErr on a successful Result');
  }
  return result.error;
}
