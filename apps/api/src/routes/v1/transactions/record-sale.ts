/**
 * POST /v1/transactions/sales - Record a sale
 *
 * Takes the units out of stock. Debt sales are tracked per customer
 * until cleared through POST /v1/debts/clear.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { RecordSaleRequestSchema } from '@stockbook/types';
import {
  InsufficientStockError,
  ItemNotFoundError,
  LedgerValidationError,
} from '@stockbook/core';
import { toTransactionResponse } from '../../../lib/serializers.js';
import type { AppBindings } from '../../../types/context.js';

const recordSaleRoute = new Hono<AppBindings>();

recordSaleRoute.post(
  '/sales',
  zValidator('json', RecordSaleRequestSchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  async (c) => {
    const { item, quantity, unitPrice, customerName, paymentMode } = c.req.valid('json');

    try {
      const result = await c
        .get('ledger')
        .recordSale(item, quantity, unitPrice, customerName, paymentMode);

      return c.json(
        {
          item: result.item,
          transaction: toTransactionResponse(result.transaction, result.index),
        },
        201
      );
    } catch (error) {
      // Handle domain errors → HTTP status codes
      if (error instanceof ItemNotFoundError) {
        return c.json({ error: error.message }, 404);
      }
      if (error instanceof LedgerValidationError) {
        return c.json({ error: error.message }, 400);
      }
      if (error instanceof InsufficientStockError) {
        return c.json(
          { error: error.message, available: error.available, requested: error.requested },
          409
        );
      }
      throw error;
    }
  }
);

export { recordSaleRoute };
