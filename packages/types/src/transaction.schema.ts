/**
 * Transaction schemas for purchases, sales and debt payments
 */

import { z } from "zod";

/**
 * Ledger row kinds. "Debt Payment" keeps its spaced label so that
 * exported tables read the same as the stored ones.
 */
export const TRANSACTION_TYPES = ["Purchase", "Sale", "Debt Payment"] as const;

export const TransactionTypeSchema = z.enum(TRANSACTION_TYPES);

/**
 * Payment mode of a row. Purchases carry the empty mode.
 */
export const PaymentModeSchema = z.enum(["Full", "Partial", "Debt", ""]);

export const SalePaymentModeSchema = z.enum(["Full", "Partial", "Debt"]);

/**
 * In-memory transaction row.
 *
 * `price` is the unit price of a sale and the settled total of a debt
 * payment. On Purchase rows it is always 0; the purchase cost lives in
 * `expense`.
 */
export const TransactionSchema = z.object({
  date: z.coerce.date(),
  type: TransactionTypeSchema,
  item: z.string(),
  quantity: z.number().int(),
  price: z.number(),
  customerName: z.string(),
  paymentMode: PaymentModeSchema,
  expense: z.number(),
});

/**
 * Request schema for recording a sale
 * - quantity: At least one unit
 * - unitPrice: Price per unit, zero allowed
 * - customerName: Optional for Full/Partial, needed to track a Debt sale
 */
export const RecordSaleRequestSchema = z.object({
  item: z.string().trim().min(1, "Item is required"),
  quantity: z
    .number()
    .int("Quantity must be a whole number")
    .min(1, "Quantity must be at least 1"),
  unitPrice: z.number().min(0, "Unit price cannot be negative"),
  customerName: z.string().trim().max(100).optional().default(""),
  paymentMode: SalePaymentModeSchema,
});

/**
 * Response schema for a transaction row
 * Rows are addressed by position, so each one carries its index
 */
export const TransactionResponseSchema = z.object({
  index: z.number().int(),
  date: z.string(), // ISO 8601 timestamp
  type: TransactionTypeSchema,
  item: z.string(),
  quantity: z.number().int(),
  price: z.number(),
  customerName: z.string(),
  paymentMode: PaymentModeSchema,
  expense: z.number(),
});

export const ListTransactionsResponseSchema = z.object({
  transactions: z.array(TransactionResponseSchema),
});

export type TransactionType = z.infer<typeof TransactionTypeSchema>;
export type PaymentMode = z.infer<typeof PaymentModeSchema>;
export type SalePaymentMode = z.infer<typeof SalePaymentModeSchema>;
export type Transaction = z.infer<typeof TransactionSchema>;
export type RecordSaleRequest = z.infer<typeof RecordSaleRequestSchema>;
export type TransactionResponse = z.infer<typeof TransactionResponseSchema>;
export type ListTransactionsResponse = z.infer<typeof ListTransactionsResponseSchema>;
