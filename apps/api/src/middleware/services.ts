import type { MiddlewareHandler } from 'hono';
import type { LedgerStore } from '@stockbook/core';
import type { AppConfig } from '../config.js';
import type { AppBindings } from '../types/context.js';

export type AppServices = {
  ledger: LedgerStore;
  config: AppConfig;
};

/**
 * Expose the ledger store and configuration to route handlers
 */
export function attachServices(services: AppServices): MiddlewareHandler<AppBindings> {
  return async (c, next) => {
    c.set('ledger', services.ledger);
    c.set('config', services.config);
    await next();
  };
}
