import type { Context, Next } from 'hono';
import type { AppBindings } from '../types/context.js';

export const PRINCIPAL_HEADER = 'x-principal-id';

/**
 * Caller identity for permissioned routes
 *
 * Authentication happens upstream; the gateway forwards the authenticated
 * principal in {@link PRINCIPAL_HEADER}. Role checks are left to the ledger.
 */
export async function requirePrincipal(c: Context<AppBindings>, next: Next) {
  const principal = c.req.header(PRINCIPAL_HEADER)?.trim();
  if (!principal) {
    return c.json({ error: 'Missing caller principal' }, 401);
  }

  c.set('principal', principal);
  return next();
}
