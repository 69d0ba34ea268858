// ---------------------------------------------------------------------------
// CancelOrderTask: cancels a pending order and restocks its lines
// ---------------------------------------------------------------------------

import { Task, required, type CallbacksConfig, type MiddlewareDefinition } from '../task.js';
import { RuntimeMiddleware } from '../middleware/index.js';
import { ForbiddenError, NotFoundError } from '../errors.js';
import { quantitiesByProduct, type Order } from '../domain/order.js';
import { assertTransition } from '../domain/order-status.js';
import { orderCancelled, stockUpdate, type StorefrontEvent } from '../domain/events.js';
import type { UserRole } from '../store/directory.js';
import { orderKey } from '../store/lock-manager.js';
import { createServiceLogger } from '../logging/logger.js';

const log = createServiceLogger('cancellation');

export interface CancelOrderContext extends Record<string, unknown> {
  order?: Order;
  events?: StorefrontEvent[];
}

export class CancelOrderTask extends Task<CancelOrderContext> {
  static override attributes = {
    orderId: required({ type: 'string', presence: true }),
    requesterId: required({ type: 'integer', numeric: { min: 1 } }),
    requesterRole: required({ inclusion: { in: ['admin', 'customer'] } }),
  };

  static override callbacks: CallbacksConfig = {
    onSuccess: ['publishEvents'],
  };

  static override middlewares: MiddlewareDefinition[] = [RuntimeMiddleware];

  declare orderId: string;
  declare requesterId: number;
  declare requesterRole: UserRole;

  override async work(): Promise<void> {
    const { order, events } = await this.services.store.transaction(
      async (session) => {
        await session.lock(orderKey(this.orderId));

        const current = session.orders.findById(this.orderId);
        if (!current) {
          throw new NotFoundError('order', this.orderId);
        }
        if (current.userId !== this.requesterId && this.requesterRole !== 'admin') {
          throw new ForbiddenError('Only the order owner or an admin can cancel this order');
        }
        const status = assertTransition(current.status, 'cancelled');

        const raised: StorefrontEvent[] = [];
        for (const [productId, quantity] of quantitiesByProduct(current.items)) {
          await session.ledger.lockAndGet(productId);
          raised.push(stockUpdate(productId, session.ledger.increment(productId, quantity)));
        }

        session.orders.updateStatus(current.id, status);

        const owner = session.directory.findUser(current.userId);
        if (!owner) {
          throw new NotFoundError('user', current.userId);
        }
        raised.push(orderCancelled(current.id, owner.name));

        return { order: { ...current, status }, events: raised };
      },
      { signal: this.signal },
    );

    this.context.set('order', order);
    this.context.set('events', events);

    log.info('Order cancelled', { orderId: order.id, restockedProducts: events.length - 1 });
  }

  protected publishEvents(): void {
    this.services.broadcaster.publishAll(this.context.get('events') ?? []);
  }
}
