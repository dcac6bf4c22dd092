import { randomUUID } from 'node:crypto';
import type { MiddlewareHandler } from 'hono';
import type { AppBindings } from '../types/context.js';

/**
 * Request ID middleware
 * Reuses an incoming x-request-id when a proxy set one, otherwise
 * generates one, and echoes it on the response for log correlation
 */
export const requestIdMiddleware: MiddlewareHandler<AppBindings> = async (c, next) => {
  const requestId = c.req.header('x-request-id') || randomUUID();

  c.set('requestId', requestId);
  c.header('x-request-id', requestId);

  await next();
};
