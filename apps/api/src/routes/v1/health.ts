import { Hono } from 'hono';
import type { AppBindings } from '../../types/context.js';
import { API_VERSION } from '../../version.js';

const healthRoute = new Hono<AppBindings>();

healthRoute.get('/', (c) => {
  const ledger = c.get('ledger');
  const response = {
    status: 'ok' as const,
    timestamp: new Date().toISOString(),
    version: API_VERSION,
    items: ledger.listItems().length,
    transactions: ledger.listTransactions().length,
  };

  return c.json(response);
});

export { healthRoute };
