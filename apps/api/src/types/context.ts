import type { AccessControlRegistry, LedgerEngine } from '@mip65/core';
import type { Logger } from '@mip65/observability';

/**
 * Shared Hono context variables for API requests.
 * Ledger and registry are per-app instances, attached by createApp.
 */
export type ContextVariables = {
  requestId: string;
  principal: string;
  ledger: LedgerEngine;
  access: AccessControlRegistry;
  logger: Logger;
};

export type AppBindings = {
  Variables: ContextVariables;
};

declare module 'hono' {
  // Allow c.var / c.get access without casting everywhere
  interface ContextVariableMap extends ContextVariables {}
}
