import type { IndexedTransaction } from '@stockbook/core';
import type { Transaction, TransactionResponse } from '@stockbook/types';

export function toTransactionResponse(tx: Transaction, index: number): TransactionResponse {
  return {
    index,
    date: tx.date.toISOString(),
    type: tx.type,
    item: tx.item,
    quantity: tx.quantity,
    price: tx.price,
    customerName: tx.customerName,
    paymentMode: tx.paymentMode,
    expense: tx.expense,
  };
}

export function toTransactionResponses(rows: IndexedTransaction[]): TransactionResponse[] {
  return rows.map((row) => toTransactionResponse(row, row.index));
}
