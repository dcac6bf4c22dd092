import { Hono } from 'hono';
import { handleError } from './lib/error-handler.js';
import { createCorsMiddleware } from './middleware/cors.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { attachServices, type AppServices } from './middleware/services.js';
import { debtsRoute } from './routes/v1/debts/index.js';
import { exportRoute } from './routes/v1/export/index.js';
import { healthRoute } from './routes/v1/health.js';
import { inventoryRoute } from './routes/v1/inventory/index.js';
import { metricsRoute } from './routes/v1/metrics/index.js';
import { transactionsRoute } from './routes/v1/transactions/index.js';
import type { AppBindings } from './types/context.js';

/**
 * Build the API around an opened ledger store
 */
export function createApp(services: AppServices) {
  const app = new Hono<AppBindings>();

  // Apply request ID middleware first for log correlation
  app.use('*', requestIdMiddleware);
  app.use('*', createCorsMiddleware(services.config.corsOrigins));
  app.use('*', attachServices(services));

  app.onError(handleError);

  app.route('/health', healthRoute);

  // Mount v1 routes
  const v1 = new Hono<AppBindings>();

  v1.route('/health', healthRoute);
  v1.route('/inventory', inventoryRoute);
  v1.route('/transactions', transactionsRoute);
  v1.route('/debts', debtsRoute);
  v1.route('/metrics', metricsRoute);
  v1.route('/export', exportRoute);

  app.route('/v1', v1);

  return app;
}

export type App = ReturnType<typeof createApp>;
