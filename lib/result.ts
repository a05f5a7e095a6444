import { z } from 'zod';

/**
 * Result type for error handling.
 * Represents either a successful result with data or a failure with an error.
 */
export type Result<T> =
  | { ok: true; data: T }
  | { ok: false; error: AppError };

/**
 * NOT_FOUND maps to 404; the other two surface as 400.
 */
export type ErrorCode = 'NOT_FOUND' | 'VALIDATION_ERROR' | 'PERSISTENCE_ERROR';

/**
 * Application error type.
 * All errors in the application should use this format.
 */
export type AppError = {
  code: ErrorCode;
  message: string;
  details?: unknown;
};

/**
 * Creates a successful Result.
 */
export function ok<T>(data: T): Result<T> {
  return { ok: true, data };
}

/**
 * Creates a failed Result.
 *
 * @param code - Error code (e.g., 'NOT_FOUND', 'VALIDATION_ERROR')
 * @param message - Human-readable error message, returned to the caller as-is
 * @param details - Optional additional error details (logged, never serialized)
 */
export function err(code: ErrorCode, message: string, details?: unknown): Result<never> {
  return {
    ok: false,
    error: {
      code,
      message,
      details,
    },
  };
}

/**
 * Joins zod issues into one line, e.g. `name: Required; hours: Expected number, received nan`.
 */
export function describeZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Converts an unknown error to an AppError.
 * Validation and JSON parse failures become VALIDATION_ERROR; anything else is
 * treated as a storage failure and keeps its raw message.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof z.ZodError) {
    return { code: 'VALIDATION_ERROR', message: describeZodError(error), details: error.issues };
  }

  if (error instanceof SyntaxError) {
    return { code: 'VALIDATION_ERROR', message: error.message || 'Malformed request body' };
  }

  if (error instanceof Error) {
    return {
      code: 'PERSISTENCE_ERROR',
      message: error.message || 'An unknown error occurred',
      details: error,
    };
  }

  if (typeof error === 'string') {
    return {
      code: 'PERSISTENCE_ERROR',
      message: error,
    };
  }

  return {
    code: 'PERSISTENCE_ERROR',
    message: 'An unknown error occurred',
    details: error,
  };
}
