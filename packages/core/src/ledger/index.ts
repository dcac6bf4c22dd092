/**
 * Ledger Domain
 *
 * Exports the ledger store, its errors, and types.
 */

export { LedgerStore } from './ledger-store.js';

export {
  LedgerError,
  LedgerValidationError,
  ItemNotFoundError,
  TransactionNotFoundError,
  DebtNotFoundError,
  InsufficientStockError,
  PersistenceError,
} from './ledger-errors.js';

export { DEBT_PAYMENT_ITEM, isOutstandingDebt, isRealizedSale } from './transaction-filters.js';

export type {
  OversellPolicy,
  LedgerStoreOptions,
  RestockResult,
  SaleResult,
  DeleteItemResult,
  DeleteTransactionResult,
  ClearDebtResult,
  IndexedTransaction,
} from './ledger-types.js';
