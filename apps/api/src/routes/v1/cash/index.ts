/**
 * Cash routes
 * Capital movements, expenses and income
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { capitalRoute } from './capital.js';
import { cashFlowRoute } from './cash-flow.js';

const cashRoute = new Hono<AppBindings>();

cashRoute.route('/', capitalRoute);
cashRoute.route('/', cashFlowRoute);

export { cashRoute };
