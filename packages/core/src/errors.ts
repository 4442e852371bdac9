/**
 * Custom error classes for the application
 * These errors provide safe error messages for API responses
 */

export interface SafeErrorDetails {
  code: string;
  message: string;
  statusCode: number;
}

/**
 * Error categories, each with a fixed HTTP status
 */
export type ErrorKind =
  | 'not_found'
  | 'failure'
  | 'validation'
  | 'forbidden'
  | 'conflict'
  | 'unexpected';

/**
 * Values interpolated into localized messages, e.g. `{ id: 42 }`
 */
export type ErrorParams = Readonly<Record<string, string | number>>;

export const ERROR_KIND_STATUS: Readonly<Record<ErrorKind, number>> = {
  not_found: 404,
  failure: 400,
  validation: 400,
  forbidden: 403,
  conflict: 409,
  unexpected: 500,
};

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly kind: ErrorKind;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly params: ErrorParams;

  constructor(message: string, code: string, kind: ErrorKind, params: ErrorParams = {}) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.kind = kind;
    this.params = params;
    this.statusCode = ERROR_KIND_STATUS[kind];
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get safe error details for API response (no sensitive info)
   */
  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Requested record does not exist
 */
export class NotFoundError extends AppError {
  constructor(code: string, message: string, params?: ErrorParams) {
    super(message, code, 'not_found', params);
    this.name = 'NotFoundError';
  }
}

/**
 * The store refused or did not apply an operation, or threw while doing so
 */
export class FailureError extends AppError {
  public readonly originalError: Error | undefined;

  constructor(code: string, message: string, originalError?: Error, params?: ErrorParams) {
    super(message, code, 'failure', params);
    this.name = 'FailureError';
    this.originalError = originalError;
  }

  /**
   * Convert an exception caught at a repository boundary into a typed failure
   */
  static fromException(error: unknown): FailureError {
    if (error instanceof Error) {
      return new FailureError('UnexpectedError', error.message, error);
    }
    return new FailureError('UnexpectedError', String(error));
  }
}

/**
 * Validation error for invalid input
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown, code = 'VALIDATION_ERROR') {
    super(message, code, 'validation');
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Operation not permitted for this process
 */
export class ForbiddenError extends AppError {
  constructor(code: string, message: string, params?: ErrorParams) {
    super(message, code, 'forbidden', params);
    this.name = 'ForbiddenError';
  }
}

/**
 * Concurrency error (optimistic locking failure)
 */
export class ConcurrencyError extends AppError {
  public readonly recordType: string;
  public readonly recordId: string;

  constructor(recordType: string, recordId: string, code = 'CONCURRENCY_ERROR') {
    super(
      `Concurrent modification detected for ${recordType}: ${recordId}. Please retry.`,
      code,
      'conflict',
      { id: recordId }
    );
    this.name = 'ConcurrencyError';
    this.recordType = recordType;
    this.recordId = recordId;
  }
}

/**
 * Programming error or fault that escaped every typed boundary
 */
export class UnexpectedError extends AppError {
  public readonly originalError: Error | undefined;

  constructor(message: string, originalError?: Error, code = 'UnexpectedError') {
    super(message, code, 'unexpected');
    this.name = 'UnexpectedError';
    this.originalError = originalError;
  }

  static from(error: unknown): UnexpectedError {
    if (error instanceof Error) {
      return new UnexpectedError(error.message, error);
    }
    return new UnexpectedError(String(error));
  }
}

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Convert unknown error to safe error response
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  // Unexpected errors may carry driver messages; never expose them
  if (isOperationalError(error) && error.kind !== 'unexpected') {
    return error.toSafeError();
  }

  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  };
}
