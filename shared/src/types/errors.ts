/**
 * Machine-readable error codes used across all API error responses.
 */
export type ErrorCode =
  | 'NOT_FOUND'
  | 'ROUTE_NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'CONFLICT'
  | 'INVALID_CREDENTIALS'
  | 'ACCOUNT_INACTIVE'
  | 'IMAGE_ANALYSIS_FAILED'
  | 'INTERNAL_ERROR';
