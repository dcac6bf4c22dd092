/**
 * CSV downloads of the ledger tables
 */

import { Hono } from 'hono';
import { inventoryToCsv, transactionsToCsv } from '@stockbook/core';
import type { AppBindings } from '../../../types/context.js';

function csvHeaders(filename: string) {
  return {
    'Content-Type': 'text/csv; charset=utf-8',
    'Content-Disposition': `attachment; filename="${filename}"`,
  };
}

const exportRoute = new Hono<AppBindings>();

exportRoute.get('/inventory.csv', (c) => {
  const csv = inventoryToCsv(c.get('ledger').listItems());

  return c.body(csv, 200, csvHeaders('inventory.csv'));
});

exportRoute.get('/transactions.csv', (c) => {
  const csv = transactionsToCsv(c.get('ledger').listTransactions());

  return c.body(csv, 200, csvHeaders('transactions.csv'));
});

export { exportRoute };
