import type { InventoryItem, Transaction } from '@stockbook/types';

/**
 * Full ledger state as read from and written to storage
 */
export interface LedgerSnapshot {
  inventory: InventoryItem[];
  transactions: Transaction[];
}

/**
 * Load/save boundary of the ledger.
 *
 * `load` reads both resources in full; a missing resource is an empty
 * collection. `save` overwrites both resources in full.
 */
export interface LedgerStorage {
  load(): Promise<LedgerSnapshot>;
  save(snapshot: LedgerSnapshot): Promise<void>;
}

export function emptySnapshot(): LedgerSnapshot {
  return { inventory: [], transactions: [] };
}
