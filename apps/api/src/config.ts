/**
 * Process configuration
 *
 * Read once from the environment at startup. Invalid values stop the
 * process before the ledger is opened.
 */

import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  INITIAL_CAPITAL: z.coerce.number().finite().default(20000),
  LEDGER_DATA_DIR: z.string().min(1).default('./data'),
  LOW_STOCK_THRESHOLD: z.coerce.number().int().min(0).default(50),
  OVERSELL_POLICY: z.enum(['allow', 'reject']).default('allow'),
  CORS_ORIGINS: z.string().default('http://localhost:5173'),
});

export type AppConfig = {
  port: number;
  initialCapital: number;
  dataDir: string;
  lowStockThreshold: number;
  oversellPolicy: 'allow' | 'reject';
  corsOrigins: string[];
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new ConfigError(`Invalid configuration: ${errors}`);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    initialCapital: parsed.INITIAL_CAPITAL,
    dataDir: parsed.LEDGER_DATA_DIR,
    lowStockThreshold: parsed.LOW_STOCK_THRESHOLD,
    oversellPolicy: parsed.OVERSELL_POLICY,
    corsOrigins: parsed.CORS_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
  };
}
