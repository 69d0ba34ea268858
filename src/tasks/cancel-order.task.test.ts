import { describe, it, expect, beforeEach } from 'vitest';
import { CancelOrderTask } from './cancel-order.task.js';
import { CheckoutTask } from './checkout.task.js';
import { createTestEnvironment, type TestEnvironment } from '../testing/fixtures.js';

describe('CancelOrderTask', () => {
  let env: TestEnvironment;
  let productId: number;
  let userId: number;
  let orderId: string;

  beforeEach(async () => {
    env = await createTestEnvironment();
    productId = env.fixtures.product({ stock: 10 });
    const customer = env.fixtures.customerWithCart('Asha Rao', productId, 3);
    userId = customer.userId;

    const placed = await CheckoutTask.execute(customer, { services: env.services });
    orderId = placed.context.require('order').id;
    env.events.length = 0;
  });

  it('should cancel a pending order and restock its lines', async () => {
    const result = await CancelOrderTask.execute(
      { orderId, requesterId: userId, requesterRole: 'customer' },
      { services: env.services },
    );

    expect(result.success).toBe(true);
    expect(result.context.require('order').status).toBe('cancelled');
    expect(env.fixtures.orderStatus(orderId)).toBe('cancelled');
    expect(env.fixtures.stockOf(productId)).toBe(10);
    expect(env.events).toEqual([
      { event: 'STOCK_UPDATE', product_id: productId, new_stock: 10 },
      { event: 'ORDER_CANCELLED', order_id: orderId, customer: 'Asha Rao' },
    ]);
  });

  it('should refuse to cancel twice and restock only once', async () => {
    const args = { orderId, requesterId: userId, requesterRole: 'customer' };
    await CancelOrderTask.execute(args, { services: env.services });

    const again = await CancelOrderTask.execute(args, { services: env.services });

    expect(again.code).toBe('INVALID_TRANSITION');
    expect(again.reason).toBe("Cannot transition order from 'cancelled' to 'cancelled'");
    expect(env.fixtures.stockOf(productId)).toBe(10);
  });

  it('should let an admin cancel any order', async () => {
    const adminId = env.fixtures.user('Store Admin', { role: 'admin' });

    const result = await CancelOrderTask.execute(
      { orderId, requesterId: adminId, requesterRole: 'admin' },
      { services: env.services },
    );

    expect(result.success).toBe(true);
    expect(env.events[1]).toEqual({ event: 'ORDER_CANCELLED', order_id: orderId, customer: 'Asha Rao' });
  });

  it("should forbid cancelling someone else's order", async () => {
    const strangerId = env.fixtures.user('Jon Mills');

    const result = await CancelOrderTask.execute(
      { orderId, requesterId: strangerId, requesterRole: 'customer' },
      { services: env.services },
    );

    expect(result.code).toBe('FORBIDDEN');
    expect(result.reason).toBe('Only the order owner or an admin can cancel this order');
    expect(env.fixtures.orderStatus(orderId)).toBe('pending');
    expect(env.fixtures.stockOf(productId)).toBe(7);
    expect(env.events).toEqual([]);
  });

  it('should refuse an order past pending', async () => {
    env.db.run("UPDATE orders SET status = 'paid' WHERE id = ?", [orderId]);

    const result = await CancelOrderTask.execute(
      { orderId, requesterId: userId, requesterRole: 'customer' },
      { services: env.services },
    );

    expect(result.code).toBe('INVALID_TRANSITION');
    expect(env.fixtures.stockOf(productId)).toBe(7);
  });

  it('should report an unknown order', async () => {
    const result = await CancelOrderTask.execute(
      { orderId: 'missing', requesterId: userId, requesterRole: 'customer' },
      { services: env.services },
    );

    expect(result.code).toBe('NOT_FOUND');
    expect(result.reason).toBe('Order missing not found');
  });

  it('should roll back when the order owner no longer exists', async () => {
    const adminId = env.fixtures.user('Store Admin', { role: 'admin' });
    env.db.exec('PRAGMA foreign_keys = OFF');
    env.db.run('DELETE FROM users WHERE id = ?', [userId]);

    const result = await CancelOrderTask.execute(
      { orderId, requesterId: adminId, requesterRole: 'admin' },
      { services: env.services },
    );

    expect(result.code).toBe('NOT_FOUND');
    expect(result.reason).toBe(`User ${userId} not found`);
    expect(env.fixtures.orderStatus(orderId)).toBe('pending');
    expect(env.fixtures.stockOf(productId)).toBe(7);
    expect(env.events).toEqual([]);
  });

  it('should let only one of two concurrent cancels restock', async () => {
    const args = { orderId, requesterId: userId, requesterRole: 'customer' };

    const results = await Promise.all([
      CancelOrderTask.execute(args, { services: env.services }),
      CancelOrderTask.execute(args, { services: env.services }),
    ]);

    expect(results.map((result) => result.code ?? 'OK').sort()).toEqual(['INVALID_TRANSITION', 'OK']);
    expect(env.fixtures.stockOf(productId)).toBe(10);
  });
});
