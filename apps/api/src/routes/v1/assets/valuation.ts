/**
 * POST /v1/assets/:assetId/valuation - Record NAV, yield, duration and maturity
 *
 * Requires DATA. Last write wins.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { AssetIdSchema, ValuationRequestSchema } from '@mip65/types';
import { toErrorResponse } from '../../../lib/error-response.js';
import { presentAuditRecord } from '../../../lib/present.js';
import { requirePrincipal } from '../../../middleware/principal.js';
import type { AppBindings } from '../../../types/context.js';

const valuationRoute = new Hono<AppBindings>();

valuationRoute.post(
  '/:assetId/valuation',
  requirePrincipal,
  zValidator('param', z.object({ assetId: AssetIdSchema }), (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  zValidator('json', ValuationRequestSchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  async (c) => {
    const { assetId } = c.req.valid('param');
    const body = c.req.valid('json');

    try {
      const record = await c.get('ledger').update({
        caller: c.get('principal'),
        assetId,
        date: body.date,
        nav: body.nav,
        yield: body.yield,
        duration: body.duration,
        maturity: body.maturity,
        correctionOf: body.correctionOf,
      });
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

export { valuationRoute };
