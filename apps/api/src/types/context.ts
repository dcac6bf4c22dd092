import type { LedgerStore } from '@stockbook/core';
import type { AppConfig } from '../config.js';

/**
 * Shared Hono context variables for API requests.
 */
export type ContextVariables = {
  requestId: string;
  ledger: LedgerStore;
  config: AppConfig;
};

export type AppBindings = {
  Variables: ContextVariables;
};

declare module 'hono' {
  // Allow c.var / c.get access without casting everywhere
  interface ContextVariableMap extends ContextVariables {}
}
