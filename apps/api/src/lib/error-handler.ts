import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { PersistenceError } from '@stockbook/core';
import { logger } from '@stockbook/observability';
import type { AppBindings } from '../types/context.js';

/**
 * Global error handler
 *
 * Route handlers map expected domain errors themselves; anything that
 * reaches this point is logged with the request id.
 */
export const handleError: ErrorHandler<AppBindings> = (err, c) => {
  const requestId = c.get('requestId') || 'unknown';

  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  if (err instanceof PersistenceError) {
    logger.error({ err, requestId, operation: err.operation }, 'Ledger change not persisted');
    return c.json(
      {
        error: 'The change was applied but could not be saved',
        operation: err.operation,
        requestId,
      },
      500
    );
  }

  logger.error({ err, requestId, path: c.req.path }, 'Unhandled error');
  return c.json({ error: 'Internal server error', requestId }, 500);
};
