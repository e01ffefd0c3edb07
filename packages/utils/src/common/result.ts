/**
 * Result type for operations that report failure as a value
 *
 * Failures carry the errors that stopped the operation; both variants carry
 * non-fatal warnings (e.g. "output truncated").
 */

export interface Success<T> {
  success: true;
  value: T;
  warnings: string[];
}

export interface Failure<E = Error> {
  success: false;
  errors: E[];
  warnings: string[];
}

export type Result<T, E = Error> = Success<T> | Failure<E>;

export function ok<T>(value: T, warnings: string[] = []): Success<T> {
  return { success: true, value, warnings };
}

/**
 * Create a failure result from a single error
 */
export function errSingle<E = Error>(error: E, warnings: string[] = []): Failure<E> {
  return { success: false, errors: [error], warnings };
}

/**
 * Unwrap a result, rethrowing its first error on failure
 *
 * @throws The first error of a failure when it is an Error instance,
 *   otherwise an Error describing all of them
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.success) {
    return result.value;
  }
  const [first] = result.errors;
  if (result.errors.length === 1 && first instanceof Error) {
    throw first;
  }
  throw new Error(
    `Unwrap failed: ${result.errors.map((e) => (e instanceof Error ? e.message : String(e))).join(", ")}`,
  );
}
