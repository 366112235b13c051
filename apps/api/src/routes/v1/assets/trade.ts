/**
 * POST /v1/assets/:assetId/buy
 * POST /v1/assets/:assetId/sell
 *
 * Requires OPS. Quantities are signed; a negated entry corrects an earlier one.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { AssetIdSchema, TradeRequestSchema } from '@mip65/types';
import { toErrorResponse } from '../../../lib/error-response.js';
import { presentAuditRecord } from '../../../lib/present.js';
import { requirePrincipal } from '../../../middleware/principal.js';
import type { AppBindings } from '../../../types/context.js';

const tradeRoute = new Hono<AppBindings>();

const TradeParamsSchema = z.object({
  assetId: AssetIdSchema,
  side: z.enum(['buy', 'sell']),
});

tradeRoute.post(
  '/:assetId/:side{buy|sell}',
  requirePrincipal,
  zValidator('param', TradeParamsSchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  zValidator('json', TradeRequestSchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  async (c) => {
    const { assetId, side } = c.req.valid('param');
    const body = c.req.valid('json');
    const ledger = c.get('ledger');
    const params = {
      caller: c.get('principal'),
      assetId,
      date: body.date,
      qty: body.qty,
      price: body.price,
      correctionOf: body.correctionOf,
    };

    try {
      const record = side === 'buy' ? await ledger.buy(params) : await ledger.sell(params);
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

export { tradeRoute };
