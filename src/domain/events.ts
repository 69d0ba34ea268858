// ---------------------------------------------------------------------------
// Storefront events pushed to observers
// ---------------------------------------------------------------------------
//
// Raised by the coordinators strictly after their transaction commits
// (commit first, publish after). Field names are the wire names.
// ---------------------------------------------------------------------------

/** A decrement that leaves stock at or below this warns, every time */
export const LOW_STOCK_THRESHOLD = 5;

export interface StockUpdateEvent {
  event: 'STOCK_UPDATE';
  product_id: number;
  new_stock: number;
}

export interface LowStockWarningEvent {
  event: 'LOW_STOCK_WARNING';
  /** Product title */
  product: string;
  product_id: number;
  remaining: number;
}

export interface NewOrderEvent {
  event: 'NEW_ORDER';
  order_id: string;
  /** Customer name */
  customer: string;
  /** Order total as a two-decimal string */
  amount: string;
}

export interface OrderCancelledEvent {
  event: 'ORDER_CANCELLED';
  order_id: string;
  customer: string;
}

export type StorefrontEvent =
  | StockUpdateEvent
  | LowStockWarningEvent
  | NewOrderEvent
  | OrderCancelledEvent;

export type StorefrontEventKind = StorefrontEvent['event'];

export function stockUpdate(productId: number, newStock: number): StockUpdateEvent {
  return { event: 'STOCK_UPDATE', product_id: productId, new_stock: newStock };
}

export function lowStockWarning(
  product: string,
  productId: number,
  remaining: number,
): LowStockWarningEvent {
  return { event: 'LOW_STOCK_WARNING', product, product_id: productId, remaining };
}

export function isLowStock(quantity: number): boolean {
  return quantity <= LOW_STOCK_THRESHOLD;
}

/**
 * STOCK_UPDATE for a product's new quantity after a sale, followed by a
 * LOW_STOCK_WARNING when the quantity is at or below the threshold.
 */
export function stockEvents(product: { id: number; title: string }, newStock: number): StorefrontEvent[] {
  const events: StorefrontEvent[] = [stockUpdate(product.id, newStock)];
  if (isLowStock(newStock)) {
    events.push(lowStockWarning(product.title, product.id, newStock));
  }
  return events;
}

export function newOrder(orderId: string, customer: string, amount: string): NewOrderEvent {
  return { event: 'NEW_ORDER', order_id: orderId, customer, amount };
}

export function orderCancelled(orderId: string, customer: string): OrderCancelledEvent {
  return { event: 'ORDER_CANCELLED', order_id: orderId, customer };
}
