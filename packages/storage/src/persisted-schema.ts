/**
 * Persisted schema contract
 *
 * Each resource is stored as `{ schemaVersion, records }`. Bump
 * SCHEMA_VERSION and add a branch in the parsers when the record shape
 * changes.
 */

import { z } from 'zod';
import { InventoryItemSchema, TransactionSchema } from '@stockbook/types';
import type { InventoryItem, Transaction } from '@stockbook/types';
import { StorageFormatError, type LedgerResource } from './storage-errors.js';

export const SCHEMA_VERSION = 1;

const VersionHeaderSchema = z.object({
  schemaVersion: z.number().int(),
});

const PersistedInventorySchema = z.object({
  schemaVersion: z.literal(SCHEMA_VERSION),
  records: z.array(InventoryItemSchema),
});

const PersistedTransactionsSchema = z.object({
  schemaVersion: z.literal(SCHEMA_VERSION),
  records: z.array(TransactionSchema),
});

export interface PersistedDocument<T> {
  schemaVersion: number;
  records: T[];
}

export interface PersistedTransaction extends Omit<Transaction, 'date'> {
  date: string; // ISO 8601 timestamp
}

function parseJson(resource: LedgerResource, raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new StorageFormatError(resource, 'not valid JSON');
  }
}

function assertSupportedVersion(resource: LedgerResource, document: unknown): void {
  const header = VersionHeaderSchema.safeParse(document);
  if (!header.success) {
    throw new StorageFormatError(resource, 'missing schemaVersion');
  }
  if (header.data.schemaVersion !== SCHEMA_VERSION) {
    throw new StorageFormatError(
      resource,
      `unsupported schemaVersion ${header.data.schemaVersion} (expected ${SCHEMA_VERSION})`
    );
  }
}

function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
}

export function parseInventoryDocument(raw: string): InventoryItem[] {
  const document = parseJson('inventory', raw);
  assertSupportedVersion('inventory', document);

  const result = PersistedInventorySchema.safeParse(document);
  if (!result.success) {
    throw new StorageFormatError('inventory', formatIssues(result.error));
  }
  return result.data.records;
}

export function parseTransactionsDocument(raw: string): Transaction[] {
  const document = parseJson('transactions', raw);
  assertSupportedVersion('transactions', document);

  const result = PersistedTransactionsSchema.safeParse(document);
  if (!result.success) {
    throw new StorageFormatError('transactions', formatIssues(result.error));
  }
  return result.data.records;
}

export function serializeInventory(items: InventoryItem[]): string {
  const document: PersistedDocument<InventoryItem> = {
    schemaVersion: SCHEMA_VERSION,
    records: items,
  };
  return JSON.stringify(document, null, 2);
}

export function serializeTransactions(transactions: Transaction[]): string {
  const document: PersistedDocument<PersistedTransaction> = {
    schemaVersion: SCHEMA_VERSION,
    records: transactions.map((tx) => ({ ...tx, date: tx.date.toISOString() })),
  };
  return JSON.stringify(document, null, 2);
}
