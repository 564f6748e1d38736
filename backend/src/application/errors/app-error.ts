/**
 * Application error taxonomy
 * Each class carries the HTTP status the error translator responds with.
 * Messages are safe to return to callers; internal detail goes in `cause`.
 */

export type AppErrorCode =
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'BUSINESS_RULE_VIOLATION'
  | 'UNAUTHORIZED'
  | 'NOT_IMPLEMENTED'
  | 'TIMEOUT'
  | 'RATE_LIMITED'
  | 'SERVICE_UNAVAILABLE';

export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: AppErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends AppError {
  readonly statusCode = 400;
  readonly code = 'INVALID_ARGUMENT';
}

export class NotFoundError extends AppError {
  readonly statusCode = 404;
  readonly code = 'NOT_FOUND';
}

export class ConflictError extends AppError {
  readonly statusCode = 409;
  readonly code = 'CONFLICT';
}

export class BusinessRuleViolationError extends AppError {
  readonly statusCode = 400;
  readonly code = 'BUSINESS_RULE_VIOLATION';
}

export class UnauthorizedError extends AppError {
  readonly statusCode = 401;
  readonly code = 'UNAUTHORIZED';
}

export class UnimplementedError extends AppError {
  readonly statusCode = 501;
  readonly code = 'NOT_IMPLEMENTED';
}

export class TimeoutError extends AppError {
  readonly statusCode = 408;
  readonly code = 'TIMEOUT';
}

export class TooManyRequestsError extends AppError {
  readonly statusCode = 429;
  readonly code = 'RATE_LIMITED';
}

/** Wraps an unexpected failure below the service layer */
export class ServiceUnavailableError extends AppError {
  readonly statusCode = 503;
  readonly code = 'SERVICE_UNAVAILABLE';
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
