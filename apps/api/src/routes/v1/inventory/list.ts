/**
 * GET /v1/inventory - List stock items
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';

const listInventoryRoute = new Hono<AppBindings>();

listInventoryRoute.get('/', (c) => {
  const items = c.get('ledger').listItems();

  return c.json({ items });
});

export { listInventoryRoute };
