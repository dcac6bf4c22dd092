/**
 * Inventory routes
 * Handles stock listing, purchases/restocks, low stock alerts and item deletion
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { addItemRoute } from './create.js';
import { listInventoryRoute } from './list.js';
import { lowStockRoute } from './low-stock.js';
import { deleteItemRoute } from './remove.js';

const inventoryRoute = new Hono<AppBindings>();

inventoryRoute.route('/', listInventoryRoute);
inventoryRoute.route('/', lowStockRoute);
inventoryRoute.route('/', addItemRoute);
inventoryRoute.route('/', deleteItemRoute);

export { inventoryRoute };
