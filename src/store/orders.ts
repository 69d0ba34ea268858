// ---------------------------------------------------------------------------
// Order aggregate repository
// ---------------------------------------------------------------------------
// An order and its lines are written together and never deleted. The only
// later write is a status change.
// ---------------------------------------------------------------------------

import { z } from 'zod';
import { Money } from '../domain/money.js';
import type { Order, OrderLine } from '../domain/order.js';
import {
  isOrderStatus,
  isPaymentStatus,
  type OrderStatus,
} from '../domain/order-status.js';
import { StoreFailureError } from '../errors.js';
import { storeCall, type Db } from './database.js';
import type { DeferWrite } from './carts.js';
import { placeholders } from './catalog.js';

const OrderRow = z.object({
  id: z.string(),
  user_id: z.number(),
  address_id: z.number(),
  total_cents: z.number().int(),
  status: z.string(),
  payment_status: z.string(),
  created_at: z.string(),
});

type OrderRow = z.infer<typeof OrderRow>;

const OrderItemRow = z.object({
  order_id: z.string(),
  product_id: z.number(),
  variant_id: z.number().nullable(),
  quantity: z.number().int(),
  unit_price_cents: z.number().int(),
});

const ORDER_COLUMNS = 'id, user_id, address_id, total_cents, status, payment_status, created_at';

export class OrderRepository {
  constructor(
    private readonly db: Db,
    private readonly defer: DeferWrite,
  ) {}

  insert(order: Order): void {
    this.defer(() => {
      this.db.run(`INSERT INTO orders (${ORDER_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?)`, [
        order.id,
        order.userId,
        order.addressId,
        order.totalAmount.getCents(),
        order.status,
        order.paymentStatus,
        order.createdAt.toISOString(),
      ]);

      for (const line of order.items) {
        this.db.run(
          `INSERT INTO order_items (order_id, product_id, variant_id, quantity, unit_price_cents)
           VALUES (?, ?, ?, ?, ?)`,
          [order.id, line.productId, line.variantId, line.quantity, line.unitPrice.getCents()],
        );
      }
    });
  }

  updateStatus(orderId: string, status: OrderStatus): void {
    this.defer(() => {
      this.db.run('UPDATE orders SET status = ? WHERE id = ?', [status, orderId]);
    });
  }

  findById(orderId: string): Order | undefined {
    return storeCall(() => {
      const row = this.db.get(OrderRow, `SELECT ${ORDER_COLUMNS} FROM orders WHERE id = ?`, [orderId]);
      return row ? this.hydrate([row])[0] : undefined;
    });
  }

  /**
   * Newest first. `userId` undefined lists every user's orders.
   */
  list(options: { userId?: number; limit: number }): Order[] {
    return storeCall(() => {
      const rows =
        options.userId === undefined
          ? this.db.all(OrderRow, `SELECT ${ORDER_COLUMNS} FROM orders ORDER BY created_at DESC, id DESC LIMIT ?`, [
              options.limit,
            ])
          : this.db.all(
              OrderRow,
              `SELECT ${ORDER_COLUMNS} FROM orders WHERE user_id = ?
               ORDER BY created_at DESC, id DESC LIMIT ?`,
              [options.userId, options.limit],
            );
      return this.hydrate(rows);
    });
  }

  private hydrate(rows: readonly OrderRow[]): Order[] {
    if (rows.length === 0) return [];

    const itemRows = this.db.all(
      OrderItemRow,
      `SELECT order_id, product_id, variant_id, quantity, unit_price_cents
       FROM order_items WHERE order_id IN (${placeholders(rows.length)}) ORDER BY id`,
      rows.map((row) => row.id),
    );

    const linesByOrder = new Map<string, OrderLine[]>();
    for (const item of itemRows) {
      const lines = linesByOrder.get(item.order_id) ?? [];
      lines.push({
        productId: item.product_id,
        variantId: item.variant_id,
        quantity: item.quantity,
        unitPrice: Money.fromCents(item.unit_price_cents),
      });
      linesByOrder.set(item.order_id, lines);
    }

    return rows.map((row) => {
      if (!isOrderStatus(row.status) || !isPaymentStatus(row.payment_status)) {
        throw new StoreFailureError(new Error(`Order ${row.id} has an unknown status`));
      }
      return {
        id: row.id,
        userId: row.user_id,
        addressId: row.address_id,
        status: row.status,
        paymentStatus: row.payment_status,
        totalAmount: Money.fromCents(row.total_cents),
        createdAt: new Date(row.created_at),
        items: linesByOrder.get(row.id) ?? [],
      };
    });
  }
}
