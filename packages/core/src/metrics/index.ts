export {
  DEFAULT_LOW_STOCK_THRESHOLD,
  totalSales,
  totalPurchaseCost,
  totalExpenses,
  grossProfit,
  netCapital,
  capitalVariationPct,
  financialSummary,
  lowStockItems,
  outstandingDebt,
  expenseEntries,
} from './metrics.js';

export { calendarDay, dailySalesSeries, dailyExpenseSeries, dailyDebtSeries } from './series.js';
