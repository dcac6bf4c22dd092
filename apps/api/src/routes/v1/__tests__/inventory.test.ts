/**
 * Tests for /v1/inventory - Stock listing, restocking, low stock and deletion
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  AddItemResponseSchema,
  ListInventoryResponseSchema,
  ListTransactionsResponseSchema,
  LowStockResponseSchema,
} from '@stockbook/types';
import {
  createTestApp,
  ErrorResponseSchema,
  makeRequest,
  readJson,
  type TestContext,
} from '../../../test/helpers.js';

describe('/v1/inventory', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestApp();
  });

  describe('GET /v1/inventory', () => {
    it('should return an empty list for a new ledger', async () => {
      const response = await makeRequest(ctx.app, 'GET', '/v1/inventory');

      expect(response.status).toBe(200);
      const data = await readJson(response, ListInventoryResponseSchema);
      expect(data.items).toEqual([]);
    });
  });

  describe('POST /v1/inventory', () => {
    it('should create an item and record the purchase', async () => {
      const response = await makeRequest(ctx.app, 'POST', '/v1/inventory', {
        name: 'Widget',
        amount: 100,
        unitsPurchased: 20,
      });

      expect(response.status).toBe(201);
      const data = await readJson(response, AddItemResponseSchema);
      expect(data.created).toBe(true);
      expect(data.item).toEqual({
        name: 'Widget',
        quantity: 20,
        costPerUnit: 5,
        sellingPrice: 0,
      });
      expect(data.transaction).toEqual({
        index: 0,
        date: '2024-03-01T10:00:00.000Z',
        type: 'Purchase',
        item: 'Widget',
        quantity: 20,
        price: 0,
        customerName: '',
        paymentMode: '',
        expense: 100,
      });
      expect(ctx.storage.saveCount).toBe(1);
    });

    it('should restock an existing item', async () => {
      await makeRequest(ctx.app, 'POST', '/v1/inventory', {
        name: 'Widget',
        amount: 100,
        unitsPurchased: 20,
      });

      const response = await makeRequest(ctx.app, 'POST', '/v1/inventory', {
        name: 'Widget',
        amount: 60,
        unitsPurchased: 10,
      });

      expect(response.status).toBe(201);
      const data = await readJson(response, AddItemResponseSchema);
      expect(data.created).toBe(false);
      expect(data.item.quantity).toBe(30);
      expect(data.transaction.index).toBe(1);
    });

    it('should reject an empty item name', async () => {
      const response = await makeRequest(ctx.app, 'POST', '/v1/inventory', {
        name: '   ',
        amount: 100,
        unitsPurchased: 20,
      });

      expect(response.status).toBe(400);
      const data = await readJson(response, ErrorResponseSchema);
      expect(data.error).toBe('Validation failed');
      expect(ctx.ledger.listItems()).toEqual([]);
    });

    it('should reject fractional units', async () => {
      const response = await makeRequest(ctx.app, 'POST', '/v1/inventory', {
        name: 'Widget',
        amount: 100,
        unitsPurchased: 2.5,
      });

      expect(response.status).toBe(400);
    });
  });

  describe('DELETE /v1/inventory/:name', () => {
    it('should delete the item and its purchases but keep sales', async () => {
      await ctx.ledger.addOrRestockItem('Widget', 100, 20);
      await ctx.ledger.addOrRestockItem('Gadget', 40, 4);
      await ctx.ledger.recordSale('Widget', 5, 10, 'Alice', 'Full');

      const response = await makeRequest(ctx.app, 'DELETE', '/v1/inventory/Widget');

      expect(response.status).toBe(204);

      const inventory = await readJson(
        await makeRequest(ctx.app, 'GET', '/v1/inventory'),
        ListInventoryResponseSchema
      );
      expect(inventory.items.map((item) => item.name)).toEqual(['Gadget']);

      const transactions = await readJson(
        await makeRequest(ctx.app, 'GET', '/v1/transactions'),
        ListTransactionsResponseSchema
      );
      expect(transactions.transactions.map((tx) => [tx.index, tx.type, tx.item])).toEqual([
        [0, 'Purchase', 'Gadget'],
        [1, 'Sale', 'Widget'],
      ]);
    });

    it('should match the item when the name arrives with surrounding spaces', async () => {
      await ctx.ledger.addOrRestockItem(' Widget', 100, 20);

      const response = await makeRequest(ctx.app, 'DELETE', '/v1/inventory/%20Widget');

      expect(response.status).toBe(204);
      expect(ctx.ledger.listItems()).toEqual([]);
    });

    it('should decode names with spaces', async () => {
      await ctx.ledger.addOrRestockItem('Blue Widget', 10, 2);

      const response = await makeRequest(ctx.app, 'DELETE', '/v1/inventory/Blue%20Widget');

      expect(response.status).toBe(204);
      expect(ctx.ledger.getItem('Blue Widget')).toBeNull();
    });

    it('should return 404 for an unknown item', async () => {
      const response = await makeRequest(ctx.app, 'DELETE', '/v1/inventory/Nothing');

      expect(response.status).toBe(404);
      const data = await readJson(response, ErrorResponseSchema);
      expect(data.error).toBe('Item not found');
    });
  });

  describe('GET /v1/inventory/low-stock', () => {
    beforeEach(async () => {
      await ctx.ledger.addOrRestockItem('Widget', 100, 20);
      await ctx.ledger.addOrRestockItem('Gadget', 300, 60);
    });

    it('should use the configured threshold by default', async () => {
      const response = await makeRequest(ctx.app, 'GET', '/v1/inventory/low-stock');

      expect(response.status).toBe(200);
      const data = await readJson(response, LowStockResponseSchema);
      expect(data.threshold).toBe(50);
      expect(data.items.map((item) => item.name)).toEqual(['Widget']);
    });

    it('should accept a threshold override', async () => {
      const response = await makeRequest(ctx.app, 'GET', '/v1/inventory/low-stock?threshold=100');

      const data = await readJson(response, LowStockResponseSchema);
      expect(data.threshold).toBe(100);
      expect(data.items.map((item) => item.name)).toEqual(['Widget', 'Gadget']);
    });

    it('should reject a non-numeric threshold', async () => {
      const response = await makeRequest(ctx.app, 'GET', '/v1/inventory/low-stock?threshold=abc');

      expect(response.status).toBe(400);
    });
  });
});
