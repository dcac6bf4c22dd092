import { describe, it, expect } from 'vitest';
import {
  parseInventoryDocument,
  parseTransactionsDocument,
  serializeTransactions,
} from '../persisted-schema.js';
import { StorageFormatError } from '../storage-errors.js';

describe('persisted schema', () => {
  it('should reject documents without a schema version', () => {
    expect(() => parseInventoryDocument(JSON.stringify({ records: [] }))).toThrow(
      'Stored inventory data is invalid: missing schemaVersion'
    );
  });

  it('should reject records with the wrong shape', () => {
    const raw = JSON.stringify({
      schemaVersion: 1,
      records: [{ name: 'Widget', quantity: 'many', costPerUnit: 1, sellingPrice: 0 }],
    });

    expect(() => parseInventoryDocument(raw)).toThrow(StorageFormatError);
  });

  it('should reject an unknown transaction type', () => {
    const raw = JSON.stringify({
      schemaVersion: 1,
      records: [
        {
          date: '2024-01-01T00:00:00.000Z',
          type: 'Refund',
          item: 'Widget',
          quantity: 1,
          price: 1,
          customerName: '',
          paymentMode: 'Full',
          expense: 0,
        },
      ],
    });

    expect(() => parseTransactionsDocument(raw)).toThrow(StorageFormatError);
  });

  it('should keep the spaced Debt Payment label', () => {
    const raw = serializeTransactions([
      {
        date: new Date('2024-01-05T10:00:00.000Z'),
        type: 'Debt Payment',
        item: 'Debt Payment',
        quantity: 1,
        price: 40,
        customerName: 'Bob',
        paymentMode: 'Full',
        expense: 0,
      },
    ]);

    const [row] = parseTransactionsDocument(raw);
    expect(row?.type).toBe('Debt Payment');
    expect(row?.date.toISOString()).toBe('2024-01-05T10:00:00.000Z');
  });
});
