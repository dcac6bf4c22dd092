/**
 * @stockbook/core - Domain logic for the bookkeeping service
 *
 * The ledger store owns inventory and transactions; metrics and exports
 * are pure functions over them that the API layer calls.
 */

export * from './ledger/index.js';
export * from './metrics/index.js';
export * from './export/index.js';
