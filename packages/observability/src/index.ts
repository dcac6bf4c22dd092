/**
 * @stockbook/observability
 *
 * Structured logging for the bookkeeping service.
 */

export { createLogger, logger } from './logger.js';
export type { Logger } from './logger.js';
