/**
 * POST /v1/assets - Register a new asset
 *
 * Requires GUARDIAN. Registering an existing id is rejected with 409;
 * use POST /v1/assets/:assetId/reset to zero an asset.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { InitAssetRequestSchema } from '@mip65/types';
import { toErrorResponse } from '../../../lib/error-response.js';
import { presentAuditRecord } from '../../../lib/present.js';
import { requirePrincipal } from '../../../middleware/principal.js';
import type { AppBindings } from '../../../types/context.js';

const createAssetRoute = new Hono<AppBindings>();

createAssetRoute.post(
  '/',
  requirePrincipal,
  zValidator('json', InitAssetRequestSchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  async (c) => {
    const { assetId } = c.req.valid('json');

    try {
      const record = await c.get('ledger').init({ caller: c.get('principal'), assetId });
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

export { createAssetRoute };
