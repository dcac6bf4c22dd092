/**
 * In-process ledger storage for tests and throwaway runs
 */

import { emptySnapshot, type LedgerSnapshot, type LedgerStorage } from './ledger-storage.js';

function cloneSnapshot(snapshot: LedgerSnapshot): LedgerSnapshot {
  return {
    inventory: snapshot.inventory.map((item) => ({ ...item })),
    transactions: snapshot.transactions.map((tx) => ({ ...tx, date: new Date(tx.date) })),
  };
}

export class MemoryLedgerStorage implements LedgerStorage {
  private snapshot: LedgerSnapshot;
  private saves = 0;

  constructor(initial: LedgerSnapshot = emptySnapshot()) {
    this.snapshot = cloneSnapshot(initial);
  }

  /**
   * Number of completed save calls
   */
  get saveCount(): number {
    return this.saves;
  }

  /**
   * Last saved state (a copy)
   */
  get current(): LedgerSnapshot {
    return cloneSnapshot(this.snapshot);
  }

  async load(): Promise<LedgerSnapshot> {
    return cloneSnapshot(this.snapshot);
  }

  async save(snapshot: LedgerSnapshot): Promise<void> {
    this.snapshot = cloneSnapshot(snapshot);
    this.saves += 1;
  }
}
