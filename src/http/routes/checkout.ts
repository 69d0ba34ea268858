// ---------------------------------------------------------------------------
// Checkout route: Hono router
// ---------------------------------------------------------------------------

import { Hono } from 'hono';
import { CheckoutTask } from '../../tasks/checkout.task.js';
import { orderToJSON } from '../../domain/order.js';
import type { Services } from '../../services.js';
import type { AppEnv } from '../auth.js';
import { CheckoutRequestSchema } from '../dto.js';
import { failureResponse } from '../errors.js';
import { readBody } from '../validate.js';

export function createCheckoutRoutes(services: Services): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // POST /api/checkout: place an order from the caller's cart
  app.post('/', async (c) => {
    const body = await readBody(c.req, CheckoutRequestSchema);
    if (!body.ok) return c.json(body.body, 422);

    const user = c.get('user');
    const result = await CheckoutTask.execute(
      { userId: user.id, addressId: body.data.address_id },
      { services, signal: c.req.raw.signal },
    );

    if (result.failed) {
      const { status, body: error } = failureResponse(result);
      return c.json(error, status);
    }
    return c.json(orderToJSON(result.context.require('order')), 201);
  });

  return app;
}
