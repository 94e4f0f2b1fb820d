/**
 * Response envelope helpers shared by the routes and the error handler.
 *
 * Every body is `{ success, data | error, meta: { requestId, timestamp } }`.
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiError, ApiResponse, ResponseMeta } from '../types/index.js';
import { ERROR_CODES, type ErrorCode } from './error-codes.js';

export { ERROR_CODES, type ErrorCode };

function responseMeta(c: Context): ResponseMeta {
  return {
    requestId: c.get('requestId') ?? 'unknown',
    timestamp: new Date().toISOString(),
  };
}

export function errorBody(c: Context, error: ApiError): ApiResponse {
  return { success: false, error, meta: responseMeta(c) };
}

export function apiResponse<T>(c: Context, data: T, status: ContentfulStatusCode = 200) {
  const body: ApiResponse<T> = { success: true, data, meta: responseMeta(c) };
  return c.json(body, status);
}

/**
 * A bare message is reported under the generic `ERROR` code.
 *
 *   apiError(c, { code: ERROR_CODES.NOT_RUNNING, message: 'Plan is already failed' }, 409);
 */
export function apiError(
  c: Context,
  error: string | (Omit<ApiError, 'code'> & { code: ErrorCode | string }),
  status: ContentfulStatusCode = 400,
) {
  const payload: ApiError = typeof error === 'string' ? { code: ERROR_CODES.ERROR, message: error } : error;
  return c.json(errorBody(c, payload), status);
}

/** Keep only word characters and hyphens, at most 100 of them, before echoing an id */
export function sanitizeId(id: string): string {
  return id.replace(/[^\w-]/g, '').slice(0, 100);
}

export function notFoundError(c: Context, resource: string, id: string) {
  return apiError(
    c,
    { code: ERROR_CODES.NOT_FOUND, message: `${resource} not found: ${sanitizeId(id)}` },
    404,
  );
}
