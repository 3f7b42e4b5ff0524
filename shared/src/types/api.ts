import type { ErrorCode } from './errors.js';

/**
 * A single field-level problem reported with VALIDATION_ERROR.
 * `path` is a JSON pointer into the request ("/price", "/tags/0/name").
 */
export interface FieldError {
  path: string;
  message: string;
  params?: Record<string, unknown>;
}

/**
 * Standard API error shape used across all endpoints.
 */
export interface ApiError {
  /** Machine-readable error code */
  code: ErrorCode;
  /** Human-readable error description */
  message: string;
  /** Optional additional error details; validation failures carry `fields` */
  details?: Record<string, unknown> & { fields?: FieldError[] };
}

/**
 * Standard API error response wrapper.
 * All error responses from the API follow this shape.
 */
export interface ApiErrorResponse {
  error: ApiError;
}
