// ---------------------------------------------------------------------------
// Storefront HTTP app: Hono
// ---------------------------------------------------------------------------

import { Hono } from 'hono';
import { v7 as uuidv7 } from 'uuid';
import { getConfiguration } from '../config.js';
import { StorefrontError } from '../errors.js';
import { runInContext } from '../request-context.js';
import { createServiceLogger } from '../logging/logger.js';
import type { Services } from '../services.js';
import { requireAuth, type AppEnv } from './auth.js';
import { errorBody, httpStatusFor } from './errors.js';
import { createCheckoutRoutes } from './routes/checkout.js';
import { createOrderRoutes } from './routes/orders.js';
import { createStockRoutes } from './routes/stock.js';
import { createEventsRoutes } from './routes/events.js';

const log = createServiceLogger('http');

export interface AppOptions {
  /** Token secret (default: the configured jwtSecret) */
  jwtSecret?: string;
  /** SSE keepalive interval (default: the configured keepAliveMs) */
  keepAliveMs?: number;
}

export function createApp(services: Services, options: AppOptions = {}): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // Request context + request logging
  app.use('*', async (c, next) => {
    const requestId = c.req.header('X-Request-Id') ?? uuidv7();
    c.set('requestId', requestId);
    c.header('X-Request-Id', requestId);

    await runInContext({ requestId }, async () => {
      const startedAt = Date.now();
      await next();
      log.info('Request', {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        durationMs: Date.now() - startedAt,
      });
    });
  });

  app.get('/health', (c) =>
    c.json({
      status: 'ok',
      observers: services.broadcaster.size,
      uptime: process.uptime(),
    }),
  );

  // Public
  app.route('/api/stock', createStockRoutes(services));
  app.route(
    '/api/events',
    createEventsRoutes(services, {
      keepAliveMs: () => options.keepAliveMs ?? getConfiguration().keepAliveMs,
    }),
  );

  // Authenticated
  const auth = requireAuth(() => options.jwtSecret ?? getConfiguration().jwtSecret);
  app.use('/api/checkout', auth);
  app.use('/api/orders', auth);
  app.use('/api/orders/*', auth);
  app.route('/api/checkout', createCheckoutRoutes(services));
  app.route('/api/orders', createOrderRoutes(services));

  app.notFound((c) => c.json(errorBody('NOT_FOUND', `Route ${c.req.method} ${c.req.path} not found`), 404));

  app.onError((err, c) => {
    if (err instanceof StorefrontError) {
      return c.json(errorBody(err.code, err.message, err.details), httpStatusFor(err.code));
    }
    log.error('Unhandled error', { error: err });
    return c.json(errorBody('INTERNAL', 'Internal server error'), 500);
  });

  return app;
}
