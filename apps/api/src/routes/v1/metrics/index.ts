/**
 * Metrics routes
 *
 * Every response is recomputed from the full transaction list.
 */

import { Hono } from 'hono';
import {
  dailyDebtSeries,
  dailyExpenseSeries,
  dailySalesSeries,
  expenseEntries,
  financialSummary,
} from '@stockbook/core';
import { toTransactionResponses } from '../../../lib/serializers.js';
import type { AppBindings } from '../../../types/context.js';

const metricsRoute = new Hono<AppBindings>();

/**
 * GET /v1/metrics/summary - Sales, expenses, profit and capital
 */
metricsRoute.get('/summary', (c) => {
  const transactions = c.get('ledger').listTransactions();

  return c.json(financialSummary(c.get('config').initialCapital, transactions));
});

/**
 * GET /v1/metrics/series - Daily sales, expense and debt totals
 */
metricsRoute.get('/series', (c) => {
  const transactions = c.get('ledger').listTransactions();

  return c.json({
    sales: dailySalesSeries(transactions),
    expenses: dailyExpenseSeries(transactions),
    debt: dailyDebtSeries(transactions),
  });
});

/**
 * GET /v1/metrics/expenses - Rows that carry an expense
 */
metricsRoute.get('/expenses', (c) => {
  const expenses = expenseEntries(c.get('ledger').listTransactions());

  return c.json({ expenses: toTransactionResponses(expenses) });
});

export { metricsRoute };
