/**
 * POST /v1/cash/capital-in - Capital contributed to the portfolio
 * POST /v1/cash/capital-out - Capital returned from the portfolio
 *
 * Requires OPS. Amounts are signed; a negated entry corrects an earlier one.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { CapitalRequestSchema } from '@mip65/types';
import { toErrorResponse } from '../../../lib/error-response.js';
import { presentAuditRecord } from '../../../lib/present.js';
import { requirePrincipal } from '../../../middleware/principal.js';
import type { AppBindings } from '../../../types/context.js';

const capitalRoute = new Hono<AppBindings>();

capitalRoute.post(
  '/:direction{capital-in|capital-out}',
  requirePrincipal,
  zValidator('json', CapitalRequestSchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  async (c) => {
    const direction = c.req.param('direction');
    const body = c.req.valid('json');
    const ledger = c.get('ledger');
    const params = {
      caller: c.get('principal'),
      date: body.date,
      amount: body.amount,
      correctionOf: body.correctionOf,
    };

    try {
      const record =
        direction === 'capital-in'
          ? await ledger.addCapital(params)
          : await ledger.removeCapital(params);
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

export { capitalRoute };
