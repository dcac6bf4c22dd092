/**
 * GET /v1/transactions - List all transactions in ledger order
 *
 * Each row carries its index, which DELETE /v1/transactions/:index takes
 */

import { Hono } from 'hono';
import { toTransactionResponses } from '../../../lib/serializers.js';
import type { AppBindings } from '../../../types/context.js';

const listTransactionsRoute = new Hono<AppBindings>();

listTransactionsRoute.get('/', (c) => {
  const transactions = toTransactionResponses(c.get('ledger').listTransactions());

  return c.json({ transactions });
});

export { listTransactionsRoute };
