/**
 * Standardized Error Codes
 *
 * Centralized error code constants for consistent error handling across all routes.
 */

export const ERROR_CODES = {
  // Not Found Errors (404)
  NOT_FOUND: 'NOT_FOUND',

  // Validation Errors (400 / 422)
  BAD_REQUEST: 'BAD_REQUEST',
  INVALID_INPUT: 'INVALID_INPUT',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  PLAN_INVALID: 'PLAN_INVALID',
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',

  // Conflict Errors (409)
  ALREADY_EXISTS: 'ALREADY_EXISTS',
  NOT_RUNNING: 'NOT_RUNNING',
  CONFLICT: 'CONFLICT',

  // Throttling & availability
  RATE_LIMITED: 'RATE_LIMITED',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  TIMEOUT: 'TIMEOUT',

  // Access
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',

  // Generic Operation Failures (500)
  ERROR: 'ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

// Type for error codes
export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

const KNOWN_CODES: ReadonlySet<string> = new Set(Object.values(ERROR_CODES));

// Helper function to check if a string is a valid error code
export function isValidErrorCode(code: string): code is ErrorCode {
  return KNOWN_CODES.has(code);
}
