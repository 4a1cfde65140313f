/**
 * Result Type - Explicit error handling without exceptions
 *
 * Used by discovery steps that are expected to fail on some hosts, so the
 * caller can record which step succeeded instead of swallowing failures.
 *
 * Pattern:
 * - Success: { success: true, data: T }
 * - Failure: { success: false, error: string }
 */

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure {
  success: false;
  error: string;
}

export type Result<T> = Success<T> | Failure;

export function ok<T>(data: T): Success<T> {
  return { success: true, data };
}

export function err(error: string): Failure {
  return { success: false, error };
}

export function isOk<T>(result: Result<T>): result is Success<T> {
  return result.success;
}
