/**
 * POST /v1/inventory - Add a new item or restock an existing one
 *
 * Records a Purchase transaction carrying the amount as expense.
 * A new item gets its cost per unit from amount / unitsPurchased.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { AddItemRequestSchema } from '@stockbook/types';
import { LedgerValidationError } from '@stockbook/core';
import { toTransactionResponse } from '../../../lib/serializers.js';
import type { AppBindings } from '../../../types/context.js';

const addItemRoute = new Hono<AppBindings>();

addItemRoute.post(
  '/',
  zValidator('json', AddItemRequestSchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  async (c) => {
    const { name, amount, unitsPurchased } = c.req.valid('json');

    try {
      const result = await c.get('ledger').addOrRestockItem(name, amount, unitsPurchased);

      return c.json(
        {
          item: result.item,
          created: result.created,
          transaction: toTransactionResponse(result.transaction, result.index),
        },
        201
      );
    } catch (error) {
      if (error instanceof LedgerValidationError) {
        return c.json({ error: error.message }, 400);
      }
      throw error;
    }
  }
);

export { addItemRoute };
