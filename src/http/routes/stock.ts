import { Hono } from 'hono';
import type { Services } from '../../services.js';
import type { AppEnv } from '../auth.js';

/**
 * GET /api/stock: full stock state, so an observer that connects (or
 * reconnects) can reconcile before applying pushed deltas.
 */
export function createStockRoutes(services: Services): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get('/', (c) => c.json({ products: services.store.catalog.listStock() }));

  return app;
}
