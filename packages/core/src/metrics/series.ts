import type { SeriesPoint, Transaction } from '@stockbook/types';
import { isOutstandingDebt } from '../ledger/transaction-filters.js';

type Transactions = readonly Transaction[];

/**
 * Calendar day of a timestamp, in UTC
 */
export function calendarDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function dailyTotals(rows: Transactions, value: (tx: Transaction) => number): SeriesPoint[] {
  const totals = new Map<string, number>();
  for (const tx of rows) {
    const day = calendarDay(tx.date);
    totals.set(day, (totals.get(day) ?? 0) + value(tx));
  }
  return [...totals.keys()].sort().map((date) => ({ date, total: totals.get(date) ?? 0 }));
}

/**
 * Summed sale price per day. Debt sales are included: this is the
 * selling activity of the day, not realized revenue.
 */
export function dailySalesSeries(transactions: Transactions): SeriesPoint[] {
  return dailyTotals(
    transactions.filter((tx) => tx.type === 'Sale'),
    (tx) => tx.price
  );
}

export function dailyExpenseSeries(transactions: Transactions): SeriesPoint[] {
  return dailyTotals(
    transactions.filter((tx) => tx.expense > 0),
    (tx) => tx.expense
  );
}

export function dailyDebtSeries(transactions: Transactions): SeriesPoint[] {
  return dailyTotals(transactions.filter(isOutstandingDebt), (tx) => tx.price);
}
