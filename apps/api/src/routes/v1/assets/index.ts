/**
 * Asset routes
 * Registration, trades, valuation updates and position queries
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { createAssetRoute } from './create.js';
import { listAssetsRoute } from './list.js';
import { resetAssetRoute } from './reset.js';
import { tradeRoute } from './trade.js';
import { valuationRoute } from './valuation.js';

const assetsRoute = new Hono<AppBindings>();

assetsRoute.route('/', listAssetsRoute);
assetsRoute.route('/', createAssetRoute);
assetsRoute.route('/', resetAssetRoute);
assetsRoute.route('/', tradeRoute);
assetsRoute.route('/', valuationRoute);

export { assetsRoute };
