// ---------------------------------------------------------------------------
// Order REST routes: Hono router
// ---------------------------------------------------------------------------

import { Hono } from 'hono';
import { CancelOrderTask } from '../../tasks/cancel-order.task.js';
import { UpdateOrderStatusTask } from '../../tasks/update-order-status.task.js';
import { orderToJSON } from '../../domain/order.js';
import { ForbiddenError, NotFoundError } from '../../errors.js';
import type { Services } from '../../services.js';
import type { AppEnv } from '../auth.js';
import { UpdateOrderStatusRequestSchema } from '../dto.js';
import { failureResponse } from '../errors.js';
import { readBody } from '../validate.js';

const LIST_LIMIT = 50;

export function createOrderRoutes(services: Services): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // GET /api/orders: the caller's orders, or everyone's for an admin
  app.get('/', (c) => {
    const user = c.get('user');
    const orders = services.store.orders.list({
      userId: user.role === 'admin' ? undefined : user.id,
      limit: LIST_LIMIT,
    });
    return c.json({ orders: orders.map(orderToJSON) });
  });

  // GET /api/orders/:id
  app.get('/:id', (c) => {
    const user = c.get('user');
    const orderId = c.req.param('id');
    const order = services.store.orders.findById(orderId);
    if (!order) {
      throw new NotFoundError('order', orderId);
    }
    if (order.userId !== user.id && user.role !== 'admin') {
      throw new ForbiddenError('Not allowed to view this order');
    }
    return c.json(orderToJSON(order));
  });

  // POST /api/orders/:id/cancel: owner or admin
  app.post('/:id/cancel', async (c) => {
    const user = c.get('user');
    const result = await CancelOrderTask.execute(
      { orderId: c.req.param('id'), requesterId: user.id, requesterRole: user.role },
      { services, signal: c.req.raw.signal },
    );

    if (result.failed) {
      const { status, body } = failureResponse(result);
      return c.json(body, status);
    }
    return c.json(orderToJSON(result.context.require('order')));
  });

  // PATCH /api/orders/:id/status: admin fulfilment transitions
  app.patch('/:id/status', async (c) => {
    const body = await readBody(c.req, UpdateOrderStatusRequestSchema);
    if (!body.ok) return c.json(body.body, 422);

    const result = await UpdateOrderStatusTask.execute(
      { orderId: c.req.param('id'), nextStatus: body.data.status, requesterRole: c.get('user').role },
      { services, signal: c.req.raw.signal },
    );

    if (result.failed) {
      const { status, body: error } = failureResponse(result);
      return c.json(error, status);
    }
    return c.json(orderToJSON(result.context.require('order')));
  });

  return app;
}
