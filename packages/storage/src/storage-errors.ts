/**
 * Storage Errors
 *
 * Raised by LedgerStorage implementations. The ledger wraps them in a
 * PersistenceError before they reach callers.
 */

export type LedgerResource = 'inventory' | 'transactions';

export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export class StorageFormatError extends StorageError {
  constructor(
    public readonly resource: LedgerResource,
    detail: string
  ) {
    super(`Stored ${resource} data is invalid: ${detail}`);
    this.name = 'StorageFormatError';
  }
}

export class StorageIoError extends StorageError {
  constructor(
    public readonly resource: LedgerResource,
    operation: 'read' | 'write',
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} ${resource}: ${reason}`, { cause });
    this.name = 'StorageIoError';
  }
}
