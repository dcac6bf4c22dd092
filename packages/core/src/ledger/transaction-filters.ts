import type { Transaction } from '@stockbook/types';

export const DEBT_PAYMENT_ITEM = 'Debt Payment';

/**
 * A sale made on credit that has not been cleared yet
 */
export function isOutstandingDebt(tx: Transaction): boolean {
  return tx.type === 'Sale' && tx.paymentMode === 'Debt';
}

/**
 * Revenue that counts toward sales: paid sales and debt payments
 */
export function isRealizedSale(tx: Transaction): boolean {
  return (tx.type === 'Sale' && tx.paymentMode !== 'Debt') || tx.type === 'Debt Payment';
}
