/**
 * HTTP test helpers
 * Builds the app around an in-memory ledger with a fixed clock
 */

import { AccessControlRegistry, InMemoryAuditLog, LedgerEngine } from '@mip65/core';
import { createLogger } from '@mip65/observability';
import { createApp } from '../app.js';
import { PRINCIPAL_HEADER } from '../middleware/principal.js';

export const NOW = new Date('2024-06-15T12:00:00.000Z');
// 2024-06-14T00:00:00Z
export const YESTERDAY = 1718323200;

export const GUARDIAN = 'guardian';
export const OPS = 'ops-desk';
export const DATA = 'oracle';

export function buildTestApp() {
  const logger = createLogger({ level: 'silent' });
  const access = new AccessControlRegistry({ deployer: GUARDIAN }, [
    { type: 'RoleGranted', role: 'OPS', principal: OPS, sender: GUARDIAN },
    { type: 'RoleGranted', role: 'DATA', principal: DATA, sender: GUARDIAN },
  ]);

  const auditLog = new InMemoryAuditLog();
  const ledger = new LedgerEngine({ access, auditLog, clock: () => NOW });
  const app = createApp({ ledger, access, logger });

  return { app, ledger, access, auditLog };
}

export type TestApp = ReturnType<typeof buildTestApp>['app'];

export interface RequestOptions {
  principal?: string;
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * Make an HTTP request to the Hono app
 */
export async function makeRequest(
  app: TestApp,
  method: string,
  path: string,
  options: RequestOptions = {}
): Promise<Response> {
  const headers: Record<string, string> = { ...options.headers };
  if (options.principal) {
    headers[PRINCIPAL_HEADER] = options.principal;
  }
  if (options.body !== undefined) {
    headers['content-type'] = 'application/json';
  }

  return app.request(path, {
    method,
    headers,
    body: options.body === undefined ? undefined : JSON.stringify(options.body),
  });
}

export async function readJson(response: Response): Promise<Record<string, unknown>> {
  return (await response.json()) as Record<string, unknown>;
}
