import type { ErrorCode } from '@larder/shared';

/**
 * Base application error with a typed error code and HTTP status.
 * All known application errors should extend this class.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    statusCode: number,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

/**
 * Also used when a resource exists but belongs to another user, so that
 * callers cannot probe for other users' ids.
 */
export class NotFoundError extends AppError {
  constructor(message = 'Resource not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', 404, message, details);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation failed', details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', 400, message, details);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized', details?: Record<string, unknown>) {
    super('UNAUTHORIZED', 401, message, details);
    this.name = 'UnauthorizedError';
  }
}

export class ConflictError extends AppError {
  constructor(message = 'Resource conflict', details?: Record<string, unknown>) {
    super('CONFLICT', 409, message, details);
    this.name = 'ConflictError';
  }
}

/**
 * The image storage / label detection collaborator reported a failure.
 * The collaborator's own message is passed through unchanged.
 */
export class ImageAnalysisError extends AppError {
  constructor(message: string) {
    super('IMAGE_ANALYSIS_FAILED', 502, message);
    this.name = 'ImageAnalysisError';
  }
}

/**
 * Build a ValidationError for a single request field, in the same
 * `details.fields` shape the error handler produces for schema failures.
 */
export function fieldValidationError(path: string, message: string): ValidationError {
  return new ValidationError(message, { fields: [{ path, message }] });
}
