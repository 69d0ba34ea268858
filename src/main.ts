// ---------------------------------------------------------------------------
// Storefront checkout service: Hono server
// ---------------------------------------------------------------------------

import { serve } from '@hono/node-server';
import { configure, loadConfiguration } from './config.js';
import { CorrelateMiddleware } from './middleware/index.js';
import { openDatabase, runMigration } from './store/database.js';
import { Store } from './store/store.js';
import { loadSeedFile, seedDemoData } from './store/seed.js';
import { EventBroadcaster } from './events/broadcaster.js';
import { createApp } from './http/app.js';
import { createServiceLogger } from './logging/logger.js';

const log = createServiceLogger('main');

async function bootstrap(): Promise<void> {
  // 1. Configuration (environment → global config, logger level/format)
  const config = loadConfiguration();

  // 2. Global task middleware and callbacks
  configure((c) => {
    c.middlewares.register(CorrelateMiddleware());
    c.callbacks.register('onFailed', (task) => {
      log.debug('Task failed', { taskName: task.taskName, taskId: task.id });
    });
  });

  // 3. SQLite
  const db = await openDatabase(config.databasePath);
  runMigration(db);
  if (config.seedDemoData) {
    seedDemoData(db, loadSeedFile());
  }
  log.info('Database initialized', { dbPath: config.databasePath });

  const store = new Store(db);
  const broadcaster = new EventBroadcaster();

  // 4. HTTP
  const app = createApp({ store, broadcaster });
  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info('Storefront listening', { url: `http://localhost:${info.port}` });
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    log.info('Shutting down', { signal });
    server.close(() => {
      store.close();
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

bootstrap().catch((err: unknown) => {
  log.error('Fatal error', { error: err });
  process.exit(1);
});
