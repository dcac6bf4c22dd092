/**
 * CSV export of the ledger tables
 *
 * Header row unquoted, every value double-quoted with embedded quotes
 * doubled.
 */

import type { InventoryItem, Transaction } from '@stockbook/types';

export const INVENTORY_CSV_HEADER = ['Item', 'Quantity', 'Cost Per Unit', 'Selling Price'];

export const TRANSACTIONS_CSV_HEADER = [
  'Date',
  'Type',
  'Item',
  'Quantity',
  'Price',
  'Customer Name',
  'Payment Mode',
  'Expense',
];

function quote(value: string | number): string {
  return `"${String(value).replace(/"/g, '""')}"`;
}

export function toCsv(
  header: readonly string[],
  rows: ReadonlyArray<ReadonlyArray<string | number>>
): string {
  const body = rows.map((row) => row.map(quote).join(','));
  return [header.join(','), ...body].join('\n');
}

export function inventoryToCsv(items: readonly InventoryItem[]): string {
  return toCsv(
    INVENTORY_CSV_HEADER,
    items.map((item) => [item.name, item.quantity, item.costPerUnit, item.sellingPrice])
  );
}

export function transactionsToCsv(transactions: readonly Transaction[]): string {
  return toCsv(
    TRANSACTIONS_CSV_HEADER,
    transactions.map((tx) => [
      tx.date.toISOString(),
      tx.type,
      tx.item,
      tx.quantity,
      tx.price,
      tx.customerName,
      tx.paymentMode,
      tx.expense,
    ])
  );
}
