/**
 * DELETE /v1/transactions/:index - Delete one transaction
 *
 * Reverses the row's stock effect: a sale returns its units, a purchase
 * takes them back out. Later rows shift down by one.
 */

import { Hono } from 'hono';
import { TransactionNotFoundError } from '@stockbook/core';
import type { AppBindings } from '../../../types/context.js';

const INDEX_REGEX = /^\d+$/;

const deleteTransactionRoute = new Hono<AppBindings>();

deleteTransactionRoute.delete('/:index', async (c) => {
  const rawIndex = c.req.param('index');

  if (!INDEX_REGEX.test(rawIndex)) {
    return c.json({ error: 'Transaction not found' }, 404);
  }

  try {
    await c.get('ledger').deleteTransaction(Number(rawIndex));
  } catch (error) {
    if (error instanceof TransactionNotFoundError) {
      return c.json({ error: 'Transaction not found' }, 404);
    }
    throw error;
  }

  return c.body(null, 204);
});

export { deleteTransactionRoute };
