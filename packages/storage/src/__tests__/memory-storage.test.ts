import { describe, it, expect } from 'vitest';
import { MemoryLedgerStorage } from '../memory-storage.js';

describe('MemoryLedgerStorage', () => {
  it('should start empty and count saves', async () => {
    const storage = new MemoryLedgerStorage();

    expect(await storage.load()).toEqual({ inventory: [], transactions: [] });
    expect(storage.saveCount).toBe(0);

    await storage.save({
      inventory: [{ name: 'Widget', quantity: 1, costPerUnit: 1, sellingPrice: 0 }],
      transactions: [],
    });

    expect(storage.saveCount).toBe(1);
    expect(storage.current.inventory).toHaveLength(1);
  });

  it('should not share state with the caller', async () => {
    const storage = new MemoryLedgerStorage();
    const snapshot = {
      inventory: [{ name: 'Widget', quantity: 1, costPerUnit: 1, sellingPrice: 0 }],
      transactions: [],
    };

    await storage.save(snapshot);
    snapshot.inventory[0]!.quantity = 99;

    expect((await storage.load()).inventory[0]!.quantity).toBe(1);
  });
});
