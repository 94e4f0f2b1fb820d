/**
 * Global error handler middleware
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { isAppError } from '@taskrelay/core';
import { ERROR_CODES, errorBody } from '../routes/helpers.js';
import { getLog } from '../services/log.js';

const log = getLog('ErrorHandler');

const STATUS_CODES: Readonly<Record<number, string>> = {
  400: ERROR_CODES.BAD_REQUEST,
  401: ERROR_CODES.UNAUTHORIZED,
  403: ERROR_CODES.FORBIDDEN,
  404: ERROR_CODES.NOT_FOUND,
  409: ERROR_CODES.CONFLICT,
  413: ERROR_CODES.PAYLOAD_TOO_LARGE,
  422: ERROR_CODES.VALIDATION_ERROR,
  429: ERROR_CODES.RATE_LIMITED,
  503: ERROR_CODES.SERVICE_UNAVAILABLE,
};

/** Status codes an AppError may surface with; anything else becomes 500 */
function toContentfulStatus(status: number): ContentfulStatusCode {
  switch (status) {
    case 400:
    case 404:
    case 408:
    case 409:
    case 422:
    case 502:
    case 503:
      return status;
    default:
      return 500;
  }
}

const UNEXPECTED = 'An unexpected error occurred';

export function errorHandler(err: Error, c: Context): Response {
  const requestId = c.get('requestId') ?? 'unknown';

  if (err instanceof HTTPException) {
    const code = STATUS_CODES[err.status] ?? ERROR_CODES.INTERNAL_ERROR;
    return c.json(errorBody(c, { code, message: err.message }), err.status);
  }

  // Malformed request body from c.req.json()
  if (err instanceof SyntaxError && err.message.includes('JSON')) {
    return c.json(errorBody(c, { code: ERROR_CODES.BAD_REQUEST, message: 'Invalid JSON in request body' }), 400);
  }

  // Thrown by validateBody
  if (err.message.startsWith('Validation failed:')) {
    return c.json(errorBody(c, { code: ERROR_CODES.INVALID_INPUT, message: err.message }), 400);
  }

  if (isAppError(err)) {
    const status = toContentfulStatus(err.statusCode);
    if (status !== 500) {
      return c.json(errorBody(c, { code: err.code, message: err.message }), status);
    }
    log.error(`[${requestId}] ${err.code}: ${err.message}`, err.toJSON());
    return c.json(errorBody(c, { code: ERROR_CODES.INTERNAL_ERROR, message: UNEXPECTED }), 500);
  }

  log.error(`[${requestId}] Unexpected error:`, err);
  return c.json(
    errorBody(c, {
      code: ERROR_CODES.INTERNAL_ERROR,
      message: UNEXPECTED,
      // message only, never the stack
      ...(process.env.NODE_ENV === 'development' ? { details: { message: err.message } } : {}),
    }),
    500,
  );
}

export function notFoundHandler(c: Context): Response {
  const path = c.req.path.replace(/[^\w/.\-~%]/g, '');
  return c.json(
    errorBody(c, { code: ERROR_CODES.NOT_FOUND, message: `Route not found: ${c.req.method} ${path}` }),
    404,
  );
}
