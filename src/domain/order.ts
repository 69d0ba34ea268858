/**
 * Order aggregate
 *
 * An order is created once per successful checkout and never deleted. Its
 * lines capture the unit price charged at that instant; only the status
 * and payment status change afterwards.
 */

import { Money } from './money.js';
import type { OrderStatus, PaymentStatus } from './order-status.js';

export interface OrderLine {
  productId: number;
  variantId: number | null;
  quantity: number;
  unitPrice: Money;
}

export interface Order {
  id: string;
  userId: number;
  addressId: number;
  status: OrderStatus;
  paymentStatus: PaymentStatus;
  totalAmount: Money;
  createdAt: Date;
  items: OrderLine[];
}

/**
 * Sum of captured line totals
 */
export function orderTotal(items: readonly OrderLine[]): Money {
  return items.reduce((total, line) => total.add(line.unitPrice.multiply(line.quantity)), Money.zero());
}

/**
 * Quantity per product, ascending by product id. Lines that share a
 * product (different variants) are summed.
 */
export function quantitiesByProduct(
  items: ReadonlyArray<{ productId: number; quantity: number }>,
): Array<[productId: number, quantity: number]> {
  const totals = new Map<number, number>();
  for (const item of items) {
    totals.set(item.productId, (totals.get(item.productId) ?? 0) + item.quantity);
  }
  return [...totals.entries()].sort(([a], [b]) => a - b);
}

/**
 * Snake_case wire representation
 */
export interface OrderJSON {
  id: string;
  user_id: number;
  address_id: number;
  status: OrderStatus;
  payment_status: PaymentStatus;
  total_amount: string;
  created_at: string;
  items: Array<{
    product_id: number;
    variant_id: number | null;
    quantity: number;
    unit_price: string;
  }>;
}

export function orderToJSON(order: Order): OrderJSON {
  return {
    id: order.id,
    user_id: order.userId,
    address_id: order.addressId,
    status: order.status,
    payment_status: order.paymentStatus,
    total_amount: order.totalAmount.toString(),
    created_at: order.createdAt.toISOString(),
    items: order.items.map((line) => ({
      product_id: line.productId,
      variant_id: line.variantId,
      quantity: line.quantity,
      unit_price: line.unitPrice.toString(),
    })),
  };
}
