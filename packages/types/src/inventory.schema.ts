/**
 * Inventory schemas for stock items and restock requests
 * Used for request/response validation and by the storage layer
 */

import { z } from "zod";

/**
 * A stock-keeping line, keyed by name.
 * Quantity is not clamped at zero: an oversold item carries negative stock.
 */
export const InventoryItemSchema = z.object({
  name: z.string().min(1),
  quantity: z.number().int(),
  costPerUnit: z.number(),
  sellingPrice: z.number(),
});

/**
 * Request schema for adding a new item or restocking an existing one
 * - name: Item label (1-100 characters, trimmed)
 * - amount: Total paid for the purchase, recorded as an expense
 * - unitsPurchased: Units added to stock
 */
export const AddItemRequestSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, "Item name is required")
    .max(100, "Item name must be 100 characters or less"),
  amount: z.number().min(0, "Amount cannot be negative"),
  unitsPurchased: z
    .number()
    .int("Units purchased must be a whole number")
    .min(0, "Units purchased cannot be negative"),
});

/**
 * Query schema for the low stock listing
 */
export const LowStockQuerySchema = z.object({
  threshold: z.coerce.number().int().min(0).optional(),
});

export const ListInventoryResponseSchema = z.object({
  items: z.array(InventoryItemSchema),
});

export const LowStockResponseSchema = z.object({
  threshold: z.number().int(),
  items: z.array(InventoryItemSchema),
});

export type InventoryItem = z.infer<typeof InventoryItemSchema>;
export type AddItemRequest = z.infer<typeof AddItemRequestSchema>;
export type LowStockQuery = z.infer<typeof LowStockQuerySchema>;
export type ListInventoryResponse = z.infer<typeof ListInventoryResponseSchema>;
export type LowStockResponse = z.infer<typeof LowStockResponseSchema>;
