/**
 * File Ledger Storage Tests
 *
 * Runs against a fresh temporary directory per test.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileLedgerStorage } from '../file-storage.js';
import { StorageFormatError, StorageIoError } from '../storage-errors.js';
import type { LedgerSnapshot } from '../ledger-storage.js';

const snapshot: LedgerSnapshot = {
  inventory: [{ name: 'Widget', quantity: 15, costPerUnit: 5, sellingPrice: 0 }],
  transactions: [
    {
      date: new Date('2024-03-01T09:30:00.000Z'),
      type: 'Purchase',
      item: 'Widget',
      quantity: 20,
      price: 0,
      customerName: '',
      paymentMode: '',
      expense: 100,
    },
    {
      date: new Date('2024-03-02T14:00:00.000Z'),
      type: 'Sale',
      item: 'Widget',
      quantity: 5,
      price: 10,
      customerName: 'Alice',
      paymentMode: 'Full',
      expense: 0,
    },
  ],
};

describe('FileLedgerStorage', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'stockbook-storage-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should return empty collections when no files exist', async () => {
      const storage = new FileLedgerStorage(directory);

      const result = await storage.load();

      expect(result).toEqual({ inventory: [], transactions: [] });
    });

    it('should load inventory when only the transactions file is missing', async () => {
      const storage = new FileLedgerStorage(directory);
      await writeFile(
        storage.inventoryPath,
        JSON.stringify({
          schemaVersion: 1,
          records: [{ name: 'Gadget', quantity: 3, costPerUnit: 2.5, sellingPrice: 4 }],
        })
      );

      const result = await storage.load();

      expect(result.inventory).toEqual([
        { name: 'Gadget', quantity: 3, costPerUnit: 2.5, sellingPrice: 4 },
      ]);
      expect(result.transactions).toEqual([]);
    });

    it('should reject an unsupported schema version', async () => {
      const storage = new FileLedgerStorage(directory);
      await writeFile(storage.inventoryPath, JSON.stringify({ schemaVersion: 2, records: [] }));

      await expect(storage.load()).rejects.toThrow(StorageFormatError);
      await expect(storage.load()).rejects.toThrow(
        'Stored inventory data is invalid: unsupported schemaVersion 2 (expected 1)'
      );
    });

    it('should reject a file that is not JSON', async () => {
      const storage = new FileLedgerStorage(directory);
      await writeFile(storage.transactionsPath, 'Date,Type,Item');

      await expect(storage.load()).rejects.toThrow(
        'Stored transactions data is invalid: not valid JSON'
      );
    });
  });

  describe('save', () => {
    it('should round-trip a snapshot with dates re-parsed', async () => {
      const storage = new FileLedgerStorage(directory);

      await storage.save(snapshot);
      const result = await storage.load();

      expect(result).toEqual(snapshot);
      expect(result.transactions[0]!.date).toBeInstanceOf(Date);
    });

    it('should persist dates as ISO 8601 strings', async () => {
      const storage = new FileLedgerStorage(directory);

      await storage.save(snapshot);
      const raw = JSON.parse(await readFile(storage.transactionsPath, 'utf-8'));

      expect(raw.schemaVersion).toBe(1);
      expect(raw.records[1].date).toBe('2024-03-02T14:00:00.000Z');
    });

    it('should overwrite previous contents in full', async () => {
      const storage = new FileLedgerStorage(directory);

      await storage.save(snapshot);
      await storage.save({ inventory: [], transactions: [] });

      expect(await storage.load()).toEqual({ inventory: [], transactions: [] });
    });

    it('should create the data directory on first save', async () => {
      const nested = join(directory, 'nested', 'data');
      const storage = new FileLedgerStorage(nested);

      await storage.save(snapshot);

      expect((await storage.load()).inventory).toHaveLength(1);
    });

    it('should let overlapping saves both finish', async () => {
      const storage = new FileLedgerStorage(directory);

      await Promise.all([storage.save(snapshot), storage.save(snapshot)]);

      expect(await storage.load()).toEqual(snapshot);
      expect((await readdir(directory)).sort()).toEqual(['inventory.json', 'transactions.json']);
    });

    it('should raise StorageIoError when the directory cannot be created', async () => {
      const blocker = join(directory, 'blocker');
      await writeFile(blocker, 'not a directory');
      const storage = new FileLedgerStorage(join(blocker, 'data'));

      await expect(storage.save(snapshot)).rejects.toThrow(StorageIoError);
    });
  });
});
