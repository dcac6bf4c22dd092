/**
 * @stockbook/storage
 *
 * Persistence boundary of the ledger: the LedgerStorage contract, a
 * JSON file implementation and an in-memory one.
 */

export type { LedgerSnapshot, LedgerStorage } from './ledger-storage.js';
export { emptySnapshot } from './ledger-storage.js';
export { FileLedgerStorage, INVENTORY_FILE, TRANSACTIONS_FILE } from './file-storage.js';
export { MemoryLedgerStorage } from './memory-storage.js';
export {
  SCHEMA_VERSION,
  parseInventoryDocument,
  parseTransactionsDocument,
  serializeInventory,
  serializeTransactions,
} from './persisted-schema.js';
export type { PersistedDocument, PersistedTransaction } from './persisted-schema.js';
export { StorageError, StorageFormatError, StorageIoError } from './storage-errors.js';
export type { LedgerResource } from './storage-errors.js';
