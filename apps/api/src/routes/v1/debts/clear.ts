/**
 * POST /v1/debts/clear - Settle a customer's debt
 *
 * Replaces all of the customer's debt sales with a single Debt Payment
 * row for their summed price. This cannot be undone row by row.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { ClearDebtRequestSchema } from '@stockbook/types';
import { DebtNotFoundError } from '@stockbook/core';
import { toTransactionResponse } from '../../../lib/serializers.js';
import type { AppBindings } from '../../../types/context.js';

const clearDebtRoute = new Hono<AppBindings>();

clearDebtRoute.post(
  '/clear',
  zValidator('json', ClearDebtRequestSchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  async (c) => {
    const { customerName } = c.req.valid('json');

    try {
      const result = await c.get('ledger').clearDebt(customerName);

      return c.json(
        {
          payment: toTransactionResponse(result.payment, result.index),
          clearedRows: result.clearedRows,
        },
        201
      );
    } catch (error) {
      if (error instanceof DebtNotFoundError) {
        return c.json({ error: error.message }, 404);
      }
      throw error;
    }
  }
);

export { clearDebtRoute };
