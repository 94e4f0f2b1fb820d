/**
 * Request ID middleware
 *
 * Echoes a caller-supplied X-Request-ID when it looks sane, otherwise
 * assigns a fresh UUID. The id ends up in every response envelope.
 */

import { createMiddleware } from 'hono/factory';
import { randomUUID } from 'node:crypto';

export const REQUEST_ID_HEADER = 'X-Request-ID';

// Alphanumerics plus . _ : = - (up to 128 chars)
const VALID_REQUEST_ID = /^[a-zA-Z0-9._:=-]{1,128}$/;

export const requestId = createMiddleware(async (c, next) => {
  const header = c.req.header(REQUEST_ID_HEADER);
  const id = header && VALID_REQUEST_ID.test(header) ? header : randomUUID();
  c.set('requestId', id);
  c.header(REQUEST_ID_HEADER, id);
  await next();
});
