/**
 * GET /v1/debts - Outstanding debt sales
 *
 * ?customer= scopes the rows and the total to one customer
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { DebtsQuerySchema } from '@stockbook/types';
import { outstandingDebt } from '@stockbook/core';
import { toTransactionResponses } from '../../../lib/serializers.js';
import type { AppBindings } from '../../../types/context.js';

const listDebtsRoute = new Hono<AppBindings>();

listDebtsRoute.get(
  '/',
  zValidator('query', DebtsQuerySchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  (c) => {
    const { customer } = c.req.valid('query');
    const ledger = c.get('ledger');

    return c.json({
      customerName: customer ?? null,
      outstanding: outstandingDebt(ledger.listTransactions(), customer),
      rows: toTransactionResponses(ledger.debtRows(customer)),
    });
  }
);

export { listDebtsRoute };
