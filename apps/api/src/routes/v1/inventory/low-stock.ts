/**
 * GET /v1/inventory/low-stock - Items below the stock threshold
 *
 * Threshold defaults to LOW_STOCK_THRESHOLD and can be overridden per request
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { LowStockQuerySchema } from '@stockbook/types';
import { lowStockItems } from '@stockbook/core';
import type { AppBindings } from '../../../types/context.js';

const lowStockRoute = new Hono<AppBindings>();

lowStockRoute.get(
  '/low-stock',
  zValidator('query', LowStockQuerySchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  (c) => {
    const threshold = c.req.valid('query').threshold ?? c.get('config').lowStockThreshold;
    const items = lowStockItems(c.get('ledger').listItems(), threshold);

    return c.json({ threshold, items });
  }
);

export { lowStockRoute };
