/**
 * Result Pattern
 *
 * Services return Result<T> instead of throwing, so the chat loop can
 * report a failed operation and keep the session alive.
 */

/**
 * Error codes surfaced through Result failures
 */
export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'STORE_ERROR'
  | 'LLM_ERROR';

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

export type Result<T> = Success<T> | Failure;

/**
 * Helper function to create a success result
 */
export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

/**
 * Helper function to create a failure result
 */
export function failure(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): Failure {
  const error: Failure['error'] = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  return {
    success: false,
    error,
  };
}

/**
 * Extract a readable message from an unknown thrown value
 */
export function errorMessage(error: unknown, fallback = 'Unknown error'): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string' && error !== '') {
    return error;
  }
  return fallback;
}
