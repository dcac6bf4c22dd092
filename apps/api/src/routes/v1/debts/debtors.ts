/**
 * GET /v1/debts/debtors - Customers with outstanding debt and their balances
 */

import { Hono } from 'hono';
import { outstandingDebt } from '@stockbook/core';
import type { AppBindings } from '../../../types/context.js';

const listDebtorsRoute = new Hono<AppBindings>();

listDebtorsRoute.get('/debtors', (c) => {
  const ledger = c.get('ledger');
  const transactions = ledger.listTransactions();
  const debtors = ledger.listDebtors().map((customerName) => ({
    customerName,
    outstanding: outstandingDebt(transactions, customerName),
  }));

  return c.json({ debtors });
});

export { listDebtorsRoute };
