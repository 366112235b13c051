import { Hono } from 'hono';
import type { AccessControlRegistry, LedgerEngine } from '@mip65/core';
import type { Logger } from '@mip65/observability';
import { requestIdMiddleware } from './middleware/request-id.js';
import { assetsRoute } from './routes/v1/assets/index.js';
import { cashRoute } from './routes/v1/cash/index.js';
import { healthRoute } from './routes/v1/health.js';
import { ledgerRoute } from './routes/v1/ledger/index.js';
import { rolesRoute } from './routes/v1/roles/index.js';
import type { AppBindings } from './types/context.js';

export interface AppDependencies {
  ledger: LedgerEngine;
  access: AccessControlRegistry;
  logger: Logger;
}

/**
 * Build the HTTP app around one ledger instance
 */
export function createApp(deps: AppDependencies) {
  const app = new Hono<AppBindings>();

  // Attach the ledger instance before anything reads it
  app.use('*', async (c, next) => {
    c.set('ledger', deps.ledger);
    c.set('access', deps.access);
    c.set('logger', deps.logger);
    await next();
  });

  // Apply request ID middleware first for log correlation
  app.use('*', requestIdMiddleware);

  app.route('/health', healthRoute);

  // Mount v1 routes
  const v1 = new Hono<AppBindings>();

  v1.route('/health', healthRoute);
  v1.route('/ledger', ledgerRoute);
  v1.route('/assets', assetsRoute);
  v1.route('/cash', cashRoute);
  v1.route('/roles', rolesRoute);

  app.route('/v1', v1);

  app.notFound((c) => c.json({ error: 'Not Found' }, 404));

  app.onError((err, c) => {
    c.get('logger').error({ err, path: c.req.path }, 'Unhandled request error');
    return c.json({ error: 'Internal Server Error' }, 500);
  });

  return app;
}
