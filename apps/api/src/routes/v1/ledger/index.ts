/**
 * Ledger read routes
 *
 * GET /v1/ledger/value - Net asset value (cash + qty * nav)
 * GET /v1/ledger/cash - Cash balance
 * GET /v1/ledger/audit - Audit records in emission order
 *
 * Reads need no role and never emit records.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { formatFixed } from '@mip65/core';
import { AuditQuerySchema } from '@mip65/types';
import { presentAuditRecord } from '../../../lib/present.js';
import type { AppBindings } from '../../../types/context.js';

const ledgerRoute = new Hono<AppBindings>();

ledgerRoute.get('/value', (c) => {
  return c.json({ value: formatFixed(c.get('ledger').value()) });
});

ledgerRoute.get('/cash', (c) => {
  return c.json({ cash: formatFixed(c.get('ledger').cash()) });
});

ledgerRoute.get(
  '/audit',
  zValidator('query', AuditQuerySchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  (c) => {
    const query = c.req.valid('query');
    const ledger = c.get('ledger');
    const records = ledger.auditRecords(query);

    return c.json({
      records: records.map(presentAuditRecord),
      lastSequence: ledger.lastSequence,
    });
  }
);

export { ledgerRoute };
