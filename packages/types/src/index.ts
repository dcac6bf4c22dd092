export * from "./inventory.schema.js";
export * from "./transaction.schema.js";
export * from "./debt.schema.js";
export * from "./metrics.schema.js";
export * from "./ledger.schema.js";
