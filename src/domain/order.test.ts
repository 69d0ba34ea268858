import { describe, it, expect } from 'vitest';
import { Money } from './money.js';
import { orderToJSON, orderTotal, quantitiesByProduct, type Order } from './order.js';
import { LOW_STOCK_THRESHOLD, stockEvents } from './events.js';

describe('Order', () => {
  const items = [
    { productId: 7, variantId: null, quantity: 3, unitPrice: Money.parse('19.99') },
    { productId: 2, variantId: 4, quantity: 1, unitPrice: Money.parse('5.00') },
    { productId: 7, variantId: 9, quantity: 2, unitPrice: Money.parse('19.99') },
  ];

  it('should total the captured line prices', () => {
    expect(orderTotal(items).toString()).toBe('104.95');
  });

  it('should total an empty order to zero', () => {
    expect(orderTotal([]).getCents()).toBe(0);
  });

  it('should sum quantities per product in ascending id order', () => {
    expect(quantitiesByProduct(items)).toEqual([
      [2, 1],
      [7, 5],
    ]);
  });

  it('should serialize to the snake_case wire shape', () => {
    const order: Order = {
      id: 'order-1',
      userId: 3,
      addressId: 8,
      status: 'pending',
      paymentStatus: 'pending',
      totalAmount: Money.parse('59.97'),
      createdAt: new Date('2024-05-01T10:00:00.000Z'),
      items: [{ productId: 7, variantId: null, quantity: 3, unitPrice: Money.parse('19.99') }],
    };

    expect(orderToJSON(order)).toEqual({
      id: 'order-1',
      user_id: 3,
      address_id: 8,
      status: 'pending',
      payment_status: 'pending',
      total_amount: '59.97',
      created_at: '2024-05-01T10:00:00.000Z',
      items: [{ product_id: 7, variant_id: null, quantity: 3, unit_price: '19.99' }],
    });
  });
});

describe('stockEvents', () => {
  const product = { id: 4, title: 'Desk Lamp' };

  it('should only report the new stock above the threshold', () => {
    expect(stockEvents(product, LOW_STOCK_THRESHOLD + 1)).toEqual([
      { event: 'STOCK_UPDATE', product_id: 4, new_stock: 6 },
    ]);
  });

  it('should warn at the threshold', () => {
    expect(stockEvents(product, 5)).toEqual([
      { event: 'STOCK_UPDATE', product_id: 4, new_stock: 5 },
      { event: 'LOW_STOCK_WARNING', product: 'Desk Lamp', product_id: 4, remaining: 5 },
    ]);
  });

  it('should warn again on every sale below the threshold', () => {
    expect(stockEvents(product, 0)[1]).toEqual({
      event: 'LOW_STOCK_WARNING',
      product: 'Desk Lamp',
      product_id: 4,
      remaining: 0,
    });
  });
});
