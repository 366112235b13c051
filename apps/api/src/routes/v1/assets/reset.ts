/**
 * POST /v1/assets/:assetId/reset - Zero an asset's position and valuation
 *
 * Requires GUARDIAN. The reset is itself an audit record; history is kept.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { AssetIdSchema } from '@mip65/types';
import { toErrorResponse } from '../../../lib/error-response.js';
import { presentAuditRecord } from '../../../lib/present.js';
import { requirePrincipal } from '../../../middleware/principal.js';
import type { AppBindings } from '../../../types/context.js';

const resetAssetRoute = new Hono<AppBindings>();

resetAssetRoute.post(
  '/:assetId/reset',
  requirePrincipal,
  zValidator('param', z.object({ assetId: AssetIdSchema }), (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  async (c) => {
    const { assetId } = c.req.valid('param');

    try {
      const record = await c.get('ledger').resetAsset({ caller: c.get('principal'), assetId });
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

export { resetAssetRoute };
