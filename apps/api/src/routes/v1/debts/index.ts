/**
 * Debt management routes
 * Lists outstanding debt sales and settles them per customer
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { clearDebtRoute } from './clear.js';
import { listDebtorsRoute } from './debtors.js';
import { listDebtsRoute } from './list.js';

const debtsRoute = new Hono<AppBindings>();

debtsRoute.route('/', listDebtsRoute);
debtsRoute.route('/', listDebtorsRoute);
debtsRoute.route('/', clearDebtRoute);

export { debtsRoute };
