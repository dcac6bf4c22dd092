/**
 * DELETE /v1/inventory/:name - Delete an item
 *
 * Also deletes the item's Purchase transactions. Its sales stay, and no
 * stock or expense is reversed.
 */

import { Hono } from 'hono';
import { ItemNotFoundError } from '@stockbook/core';
import type { AppBindings } from '../../../types/context.js';

const deleteItemRoute = new Hono<AppBindings>();

deleteItemRoute.delete('/:name', async (c) => {
  const name = c.req.param('name');

  try {
    await c.get('ledger').deleteItem(name);
  } catch (error) {
    if (error instanceof ItemNotFoundError) {
      return c.json({ error: 'Item not found' }, 404);
    }
    throw error;
  }

  return c.body(null, 204);
});

export { deleteItemRoute };
