/**
 * Financial aggregates over the ledger
 *
 * Pure functions, recomputed from the full collections on every call.
 * Empty input gives zeros.
 */

import type { FinancialSummary, InventoryItem, Transaction } from '@stockbook/types';
import { isOutstandingDebt, isRealizedSale } from '../ledger/transaction-filters.js';

export const DEFAULT_LOW_STOCK_THRESHOLD = 50;

type Transactions = readonly Transaction[];

function sumBy<T>(rows: readonly T[], value: (row: T) => number): number {
  return rows.reduce((total, row) => total + value(row), 0);
}

/**
 * Paid sales plus debt payments, at quantity × price
 */
export function totalSales(transactions: Transactions): number {
  return sumBy(transactions.filter(isRealizedSale), (tx) => tx.quantity * tx.price);
}

/**
 * Quantity × price over Purchase rows.
 * Purchase rows keep price at 0, so this stays 0; their cost is in `expense`.
 */
export function totalPurchaseCost(transactions: Transactions): number {
  return sumBy(
    transactions.filter((tx) => tx.type === 'Purchase'),
    (tx) => tx.quantity * tx.price
  );
}

export function totalExpenses(transactions: Transactions): number {
  return sumBy(transactions, (tx) => tx.expense);
}

export function grossProfit(transactions: Transactions): number {
  return totalSales(transactions) - totalPurchaseCost(transactions) - totalExpenses(transactions);
}

export function netCapital(initialCapital: number, transactions: Transactions): number {
  return initialCapital + grossProfit(transactions);
}

/**
 * Percentage change of capital, or null when there is no initial capital
 */
export function capitalVariationPct(
  initialCapital: number,
  transactions: Transactions
): number | null {
  if (initialCapital === 0) {
    return null;
  }
  return ((netCapital(initialCapital, transactions) - initialCapital) * 100) / initialCapital;
}

export function financialSummary(
  initialCapital: number,
  transactions: Transactions
): FinancialSummary {
  const sales = totalSales(transactions);
  const purchaseCost = totalPurchaseCost(transactions);
  const expenses = totalExpenses(transactions);
  const profit = sales - purchaseCost - expenses;
  const capital = initialCapital + profit;

  return {
    initialCapital,
    totalSales: sales,
    totalPurchaseCost: purchaseCost,
    totalExpenses: expenses,
    grossProfit: profit,
    netCapital: capital,
    capitalVariationPct: initialCapital === 0 ? null : (profit * 100) / initialCapital,
  };
}

export function lowStockItems(
  items: readonly InventoryItem[],
  threshold: number = DEFAULT_LOW_STOCK_THRESHOLD
): InventoryItem[] {
  return items.filter((item) => item.quantity < threshold);
}

/**
 * Summed price of outstanding debt sales, for one customer or everyone
 */
export function outstandingDebt(transactions: Transactions, customerName?: string): number {
  return sumBy(
    transactions.filter(
      (tx) =>
        isOutstandingDebt(tx) && (customerName === undefined || tx.customerName === customerName)
    ),
    (tx) => tx.price
  );
}

/**
 * Rows that carry an expense
 */
export function expenseEntries<T extends Transaction>(transactions: readonly T[]): T[] {
  return transactions.filter((tx) => tx.expense > 0);
}
