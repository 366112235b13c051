/**
 * POST /v1/cash/expenses - Expense paid from portfolio cash
 * POST /v1/cash/income - Income received into portfolio cash
 *
 * Requires OPS. Each entry carries a free-text reason.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { CashFlowRequestSchema } from '@mip65/types';
import { toErrorResponse } from '../../../lib/error-response.js';
import { presentAuditRecord } from '../../../lib/present.js';
import { requirePrincipal } from '../../../middleware/principal.js';
import type { AppBindings } from '../../../types/context.js';

const cashFlowRoute = new Hono<AppBindings>();

cashFlowRoute.post(
  '/:kind{expenses|income}',
  requirePrincipal,
  zValidator('json', CashFlowRequestSchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  async (c) => {
    const kind = c.req.param('kind');
    const body = c.req.valid('json');
    const ledger = c.get('ledger');
    const params = {
      caller: c.get('principal'),
      date: body.date,
      amount: body.amount,
      reason: body.reason,
      correctionOf: body.correctionOf,
    };

    try {
      const record =
        kind === 'expenses' ? await ledger.expense(params) : await ledger.income(params);
      return c.json({ record: presentAuditRecord(record) }, 201);
    } catch (error) {
      const mapped = toErrorResponse(error);
      if (mapped) {
        return c.json(mapped.body, mapped.status);
      }
      throw error;
    }
  }
);

export { cashFlowRoute };
