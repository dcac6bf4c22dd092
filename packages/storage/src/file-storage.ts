/**
 * File Ledger Storage
 *
 * Keeps inventory.json and transactions.json in a data directory.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { LedgerSnapshot, LedgerStorage } from './ledger-storage.js';
import {
  parseInventoryDocument,
  parseTransactionsDocument,
  serializeInventory,
  serializeTransactions,
} from './persisted-schema.js';
import { StorageIoError, type LedgerResource } from './storage-errors.js';

export const INVENTORY_FILE = 'inventory.json';
export const TRANSACTIONS_FILE = 'transactions.json';

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileLedgerStorage implements LedgerStorage {
  constructor(private readonly directory: string) {}

  get inventoryPath(): string {
    return join(this.directory, INVENTORY_FILE);
  }

  get transactionsPath(): string {
    return join(this.directory, TRANSACTIONS_FILE);
  }

  async load(): Promise<LedgerSnapshot> {
    const [inventoryRaw, transactionsRaw] = await Promise.all([
      this.readResource('inventory', this.inventoryPath),
      this.readResource('transactions', this.transactionsPath),
    ]);

    return {
      inventory: inventoryRaw === null ? [] : parseInventoryDocument(inventoryRaw),
      transactions: transactionsRaw === null ? [] : parseTransactionsDocument(transactionsRaw),
    };
  }

  async save(snapshot: LedgerSnapshot): Promise<void> {
    try {
      await mkdir(this.directory, { recursive: true });
    } catch (error) {
      throw new StorageIoError('inventory', 'write', error);
    }

    await this.writeResource('inventory', this.inventoryPath, serializeInventory(snapshot.inventory));
    await this.writeResource(
      'transactions',
      this.transactionsPath,
      serializeTransactions(snapshot.transactions)
    );
  }

  private async readResource(resource: LedgerResource, path: string): Promise<string | null> {
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw new StorageIoError(resource, 'read', error);
    }
  }

  /**
   * Write beside the target, then rename over it, so a reader never sees
   * a half-written file. Each write gets its own temporary name.
   */
  private async writeResource(resource: LedgerResource, path: string, contents: string) {
    const tempPath = `${path}.${randomUUID()}.tmp`;
    try {
      await writeFile(tempPath, contents, 'utf-8');
      await rename(tempPath, path);
    } catch (error) {
      throw new StorageIoError(resource, 'write', error);
    }
  }
}
