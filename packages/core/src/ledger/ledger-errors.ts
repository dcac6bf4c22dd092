/**
 * Ledger Domain Errors
 *
 * Thrown by the ledger store and mapped to HTTP status codes by route handlers
 */

export class LedgerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LedgerError';
  }
}

export class LedgerValidationError extends LedgerError {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerValidationError';
  }
}

export class ItemNotFoundError extends LedgerError {
  constructor(public readonly itemName: string) {
    super(`Item not found: ${itemName}`);
    this.name = 'ItemNotFoundError';
  }
}

export class TransactionNotFoundError extends LedgerError {
  constructor(public readonly index: number) {
    super(`Transaction not found at index ${index}`);
    this.name = 'TransactionNotFoundError';
  }
}

export class DebtNotFoundError extends LedgerError {
  constructor(public readonly customerName: string) {
    super(`No outstanding debt for customer: ${customerName}`);
    this.name = 'DebtNotFoundError';
  }
}

export class InsufficientStockError extends LedgerError {
  constructor(
    public readonly itemName: string,
    public readonly available: number,
    public readonly requested: number
  ) {
    super(`Insufficient stock for ${itemName}: ${available} available, ${requested} requested`);
    this.name = 'InsufficientStockError';
  }
}

/**
 * The in-memory change was applied but could not be written to storage
 */
export class PersistenceError extends LedgerError {
  constructor(
    public readonly operation: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to persist ledger after ${operation}: ${reason}`, { cause });
    this.name = 'PersistenceError';
  }
}
