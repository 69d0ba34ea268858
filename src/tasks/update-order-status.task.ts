// ---------------------------------------------------------------------------
// UpdateOrderStatusTask: admin-driven fulfilment transitions
// ---------------------------------------------------------------------------
// Cancellation is refused here: it has to restock, so it only goes through
// CancelOrderTask.
// ---------------------------------------------------------------------------

import { Task, required, type MiddlewareDefinition } from '../task.js';
import { RuntimeMiddleware } from '../middleware/index.js';
import { ForbiddenError, InvalidTransitionError, NotFoundError } from '../errors.js';
import type { Order } from '../domain/order.js';
import { ORDER_STATUSES, assertTransition, type OrderStatus } from '../domain/order-status.js';
import type { UserRole } from '../store/directory.js';
import { orderKey } from '../store/lock-manager.js';

export interface UpdateOrderStatusContext extends Record<string, unknown> {
  order?: Order;
}

export class UpdateOrderStatusTask extends Task<UpdateOrderStatusContext> {
  static override attributes = {
    orderId: required({ type: 'string', presence: true }),
    nextStatus: required({ inclusion: { in: ORDER_STATUSES } }),
    requesterRole: required({ inclusion: { in: ['admin', 'customer'] } }),
  };

  static override middlewares: MiddlewareDefinition[] = [RuntimeMiddleware];

  declare orderId: string;
  declare nextStatus: OrderStatus;
  declare requesterRole: UserRole;

  override async work(): Promise<void> {
    if (this.requesterRole !== 'admin') {
      throw new ForbiddenError('Only admins can change order status');
    }

    const order = await this.services.store.transaction(
      async (session) => {
        await session.lock(orderKey(this.orderId));

        const current = session.orders.findById(this.orderId);
        if (!current) {
          throw new NotFoundError('order', this.orderId);
        }
        if (this.nextStatus === 'cancelled') {
          throw new InvalidTransitionError(current.status, this.nextStatus);
        }

        const next = assertTransition(current.status, this.nextStatus);
        session.orders.updateStatus(current.id, next);
        return { ...current, status: next };
      },
      { signal: this.signal },
    );

    this.context.set('order', order);
  }
}
