/**
 * Transaction routes
 * Handles listing, recording sales and deleting single rows
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { listTransactionsRoute } from './list.js';
import { recordSaleRoute } from './record-sale.js';
import { deleteTransactionRoute } from './remove.js';

const transactionsRoute = new Hono<AppBindings>();

transactionsRoute.route('/', listTransactionsRoute);
transactionsRoute.route('/', recordSaleRoute);
transactionsRoute.route('/', deleteTransactionRoute);

export { transactionsRoute };
