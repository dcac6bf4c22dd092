/**
 * Financial metrics schemas for the dashboard endpoints
 */

import { z } from "zod";
import { TransactionResponseSchema } from "./transaction.schema.js";

export const FinancialSummarySchema = z.object({
  initialCapital: z.number(),
  totalSales: z.number(),
  totalPurchaseCost: z.number(),
  totalExpenses: z.number(),
  grossProfit: z.number(),
  netCapital: z.number(),
  capitalVariationPct: z.number().nullable(), // null when initial capital is zero
});

/**
 * One point of a daily series; date is a calendar day (YYYY-MM-DD, UTC)
 */
export const SeriesPointSchema = z.object({
  date: z.string(),
  total: z.number(),
});

export const MetricsSeriesResponseSchema = z.object({
  sales: z.array(SeriesPointSchema),
  expenses: z.array(SeriesPointSchema),
  debt: z.array(SeriesPointSchema),
});

export const ExpenseEntriesResponseSchema = z.object({
  expenses: z.array(TransactionResponseSchema),
});

export type FinancialSummary = z.infer<typeof FinancialSummarySchema>;
export type SeriesPoint = z.infer<typeof SeriesPointSchema>;
export type MetricsSeriesResponse = z.infer<typeof MetricsSeriesResponseSchema>;
export type ExpenseEntriesResponse = z.infer<typeof ExpenseEntriesResponseSchema>;
