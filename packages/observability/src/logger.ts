import pino from 'pino';

/**
 * Paths redacted from every log line.
 * Customer names are personal data and stay out of the logs; the
 * remaining paths cover credentials passed through request context.
 */
const REDACTION_PATHS = [
  'customerName',
  '*.customerName',
  'req.headers.authorization',
  'headers.authorization',
  'password',
  'token',
  'secret',
  'apiKey',
];

export type Logger = pino.Logger;

/**
 * Create a structured logger instance with Pino
 *
 * - Level from LOG_LEVEL (default info)
 * - ISO 8601 timestamps
 * - Redaction of customer names and secrets
 *
 * Pass a destination to capture output (tests) instead of writing to stdout.
 */
export function createLogger(
  options?: pino.LoggerOptions,
  destination?: pino.DestinationStream
): Logger {
  const config: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
