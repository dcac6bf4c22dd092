/**
 * HTTP test helpers
 * Builds the app over in-memory storage and reads typed response bodies
 */

import { z } from 'zod';
import { LedgerStore } from '@stockbook/core';
import { createLogger } from '@stockbook/observability';
import { MemoryLedgerStorage, type LedgerSnapshot } from '@stockbook/storage';
import { createApp, type App } from '../app.js';
import type { AppConfig } from '../config.js';

export const TEST_NOW = new Date('2024-03-01T10:00:00.000Z');

export const TEST_CONFIG: AppConfig = {
  port: 0,
  initialCapital: 20000,
  dataDir: './data',
  lowStockThreshold: 50,
  oversellPolicy: 'allow',
  corsOrigins: ['http://localhost:5173'],
};

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
  })
  .passthrough();

export interface TestContext {
  app: App;
  ledger: LedgerStore;
  storage: MemoryLedgerStorage;
  config: AppConfig;
}

export async function createTestApp(
  overrides: Partial<AppConfig> = {},
  snapshot?: LedgerSnapshot
): Promise<TestContext> {
  const config = { ...TEST_CONFIG, ...overrides };
  const storage = new MemoryLedgerStorage(snapshot);
  const ledger = await LedgerStore.open({
    storage,
    logger: createLogger({ level: 'silent' }),
    oversellPolicy: config.oversellPolicy,
    now: () => TEST_NOW,
  });

  return { app: createApp({ ledger, config }), ledger, storage, config };
}

/**
 * Make an HTTP request to the app, sending `body` as JSON
 */
export async function makeRequest(
  app: App,
  method: string,
  path: string,
  body?: unknown,
  headers: Record<string, string> = {}
): Promise<Response> {
  const init: RequestInit = {
    method: method.toUpperCase(),
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return app.request(path, init);
}

/**
 * Parse a JSON response body against a schema
 */
export async function readJson<T extends z.ZodTypeAny>(
  response: Response,
  schema: T
): Promise<z.infer<T>> {
  return schema.parse(await response.json());
}
