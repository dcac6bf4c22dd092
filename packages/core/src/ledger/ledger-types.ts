/**
 * Ledger Domain Types
 *
 * Options and operation results of the ledger store
 */

import type { Logger } from '@stockbook/observability';
import type { LedgerStorage } from '@stockbook/storage';
import type { InventoryItem, Transaction } from '@stockbook/types';

/**
 * What a sale does when it would take stock below zero.
 * `allow` records the sale and leaves negative stock; `reject` refuses it.
 */
export type OversellPolicy = 'allow' | 'reject';

export interface LedgerStoreOptions {
  storage: LedgerStorage;
  logger?: Logger;
  now?: () => Date;
  oversellPolicy?: OversellPolicy;
}

export interface RestockResult {
  item: InventoryItem;
  transaction: Transaction;
  index: number;
  created: boolean;
}

export interface SaleResult {
  item: InventoryItem;
  transaction: Transaction;
  index: number;
}

export interface DeleteItemResult {
  item: InventoryItem;
  removedTransactions: number;
}

export interface DeleteTransactionResult {
  transaction: Transaction;
  item: InventoryItem | null; // stock line after reversal, null when the item is gone
}

export interface ClearDebtResult {
  payment: Transaction;
  index: number;
  clearedRows: number;
}

export interface IndexedTransaction extends Transaction {
  index: number;
}
