/**
 * Result Pattern Implementation
 *
 * All service methods return Result<T> - never throw for expected failures.
 * The error code parameter narrows `error.code` to the codes a method can
 * actually produce.
 */

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure<C extends string = string> {
  success: false;
  error: {
    code: C;
    message: string;
    details?: Record<string, unknown>;
  };
}

export type Result<T, C extends string = string> = Success<T> | Failure<C>;

/**
 * Helper function to create a success result
 */
export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

/**
 * Helper function to create a failure result
 */
export function failure<C extends string>(
  code: C,
  message: string,
  details?: Record<string, unknown>
): Failure<C> {
  const error: Failure<C>['error'] = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  return {
    success: false,
    error,
  };
}

/**
 * Type guard to check if result is success
 */
export function isSuccess<T, C extends string>(
  result: Result<T, C>
): result is Success<T> {
  return result.success === true;
}

/**
 * Type guard to check if result is failure
 */
export function isFailure<T, C extends string>(
  result: Result<T, C>
): result is Failure<C> {
  return result.success === false;
}
