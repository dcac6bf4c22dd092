/**
 * Debt management schemas
 */

import { z } from "zod";
import { TransactionResponseSchema } from "./transaction.schema.js";

export const ClearDebtRequestSchema = z.object({
  customerName: z.string().trim().min(1, "Customer name is required"),
});

export const DebtsQuerySchema = z.object({
  customer: z.string().trim().min(1).optional(),
});

/**
 * Outstanding debt rows, optionally scoped to one customer
 */
export const DebtsResponseSchema = z.object({
  customerName: z.string().nullable(),
  outstanding: z.number(),
  rows: z.array(TransactionResponseSchema),
});

export const DebtorSchema = z.object({
  customerName: z.string(),
  outstanding: z.number(),
});

export const ListDebtorsResponseSchema = z.object({
  debtors: z.array(DebtorSchema),
});

/**
 * Response for a cleared debt: the single Debt Payment row that replaced
 * the customer's debt sales
 */
export const ClearDebtResponseSchema = z.object({
  payment: TransactionResponseSchema,
  clearedRows: z.number().int(),
});

export type ClearDebtRequest = z.infer<typeof ClearDebtRequestSchema>;
export type DebtsQuery = z.infer<typeof DebtsQuerySchema>;
export type DebtsResponse = z.infer<typeof DebtsResponseSchema>;
export type Debtor = z.infer<typeof DebtorSchema>;
export type ListDebtorsResponse = z.infer<typeof ListDebtorsResponseSchema>;
export type ClearDebtResponse = z.infer<typeof ClearDebtResponseSchema>;
