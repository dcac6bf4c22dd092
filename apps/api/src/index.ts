import { resolve } from 'node:path';
import { serve } from '@hono/node-server';
import { LedgerStore } from '@stockbook/core';
import { logger } from '@stockbook/observability';
import { FileLedgerStorage } from '@stockbook/storage';
import { createApp } from './app.js';
import { loadConfig } from './config.js';

async function main() {
  const config = loadConfig();
  const dataDir = resolve(config.dataDir);

  const ledger = await LedgerStore.open({
    storage: new FileLedgerStorage(dataDir),
    logger,
    oversellPolicy: config.oversellPolicy,
  });

  const app = createApp({ ledger, config });

  logger.info(
    { port: config.port, dataDir, initialCapital: config.initialCapital },
    'Starting server'
  );

  serve({
    fetch: app.fetch,
    port: config.port,
  });

  logger.info({ port: config.port }, 'Server running');
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start server');
  process.exitCode = 1;
});
