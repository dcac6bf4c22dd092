/**
 * Responses of ledger mutations that return both the stock line and
 * the row that changed it
 */

import { z } from "zod";
import { InventoryItemSchema } from "./inventory.schema.js";
import { TransactionResponseSchema } from "./transaction.schema.js";

/**
 * Add/restock: the stock line after the purchase and its Purchase row
 */
export const AddItemResponseSchema = z.object({
  item: InventoryItemSchema,
  created: z.boolean(),
  transaction: TransactionResponseSchema,
});

/**
 * Recorded sale: `item` may show negative stock when oversell is allowed
 */
export const RecordSaleResponseSchema = z.object({
  item: InventoryItemSchema,
  transaction: TransactionResponseSchema,
});

export type AddItemResponse = z.infer<typeof AddItemResponseSchema>;
export type RecordSaleResponse = z.infer<typeof RecordSaleResponseSchema>;

export const HealthResponseSchema = z.object({
  status: z.literal("ok"),
  timestamp: z.string(),
  version: z.string(),
  items: z.number().int(),
  transactions: z.number().int(),
});

export type HealthResponse = z.infer<typeof HealthResponseSchema>;
