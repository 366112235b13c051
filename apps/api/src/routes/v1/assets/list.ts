/**
 * GET /v1/assets - Registered asset ids in registration order
 * GET /v1/assets/:assetId - Position and valuation of one asset
 *
 * Unknown ids return all-zero details rather than 404.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { AssetIdSchema } from '@mip65/types';
import { presentAssetDetails } from '../../../lib/present.js';
import type { AppBindings } from '../../../types/context.js';

const listAssetsRoute = new Hono<AppBindings>();

listAssetsRoute.get('/', (c) => {
  return c.json({ assets: c.get('ledger').assets() });
});

listAssetsRoute.get(
  '/:assetId',
  zValidator('param', z.object({ assetId: AssetIdSchema }), (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  (c) => {
    const { assetId } = c.req.valid('param');
    return c.json(presentAssetDetails(assetId, c.get('ledger').details(assetId)));
  }
);

export { listAssetsRoute };
