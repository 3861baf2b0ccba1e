/**
 * Request ID Middleware
 *
 * Attaches a request ID to every request: reused from the client's
 * `X-Request-Id` header when present, otherwise a fresh ULID. Exposed to
 * handlers as `c.get('requestId')` and echoed in the response headers.
 */

import type { Context, Next } from 'hono';
import { ulid } from 'ulidx';

export type RequestIdVariables = {
  requestId: string;
};

export async function requestIdMiddleware(
  c: Context<{ Variables: RequestIdVariables }>,
  next: Next
): Promise<void> {
  const requestId = c.req.header('x-request-id') || `req_${ulid()}`;
  c.set('requestId', requestId);
  c.header('X-Request-Id', requestId);
  await next();
}
