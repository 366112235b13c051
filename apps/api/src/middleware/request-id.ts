import type { Context, Next } from 'hono';
import { randomUUID } from 'node:crypto';
import type { AppBindings } from '../types/context.js';

/**
 * Request ID middleware
 * Reuses an upstream request ID when present, otherwise generates one.
 * The ID is echoed in the response and bound to the request logger.
 */
export async function requestIdMiddleware(c: Context<AppBindings>, next: Next) {
  const requestId =
    c.req.header('x-request-id') || c.req.header('x-correlation-id') || randomUUID();

  c.set('requestId', requestId);
  c.set('logger', c.get('logger').child({ requestId }));
  c.header('x-request-id', requestId);

  await next();
}
