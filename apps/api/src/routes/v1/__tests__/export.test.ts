/**
 * Tests for /v1/export - CSV downloads
 */

import { describe, it, expect } from 'vitest';
import { createTestApp, makeRequest } from '../../../test/helpers.js';

describe('/v1/export', () => {
  it('should download inventory as CSV', async () => {
    const { app, ledger } = await createTestApp();
    await ledger.addOrRestockItem('Widget', 100, 20);

    const response = await makeRequest(app, 'GET', '/v1/export/inventory.csv');

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/csv; charset=utf-8');
    expect(response.headers.get('content-disposition')).toBe(
      'attachment; filename="inventory.csv"'
    );
    expect(await response.text()).toBe(
      'Item,Quantity,Cost Per Unit,Selling Price\n"Widget","20","5","0"'
    );
  });

  it('should download transactions as CSV', async () => {
    const { app, ledger } = await createTestApp();
    await ledger.addOrRestockItem('Widget', 100, 20);
    await ledger.recordSale('Widget', 5, 10, 'Alice', 'Full');

    const response = await makeRequest(app, 'GET', '/v1/export/transactions.csv');

    expect((await response.text()).split('\n')).toEqual([
      'Date,Type,Item,Quantity,Price,Customer Name,Payment Mode,Expense',
      '"2024-03-01T10:00:00.000Z","Purchase","Widget","20","0","","","100"',
      '"2024-03-01T10:00:00.000Z","Sale","Widget","5","10","Alice","Full","0"',
    ]);
  });
});
