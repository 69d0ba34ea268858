import { describe, it, expect } from 'vitest';
import {
  ORDER_STATUSES,
  assertTransition,
  canTransition,
  isOrderStatus,
} from './order-status.js';
import { InvalidTransitionError } from '../errors.js';

describe('Order status machine', () => {
  it('should allow the fulfilment path', () => {
    expect(canTransition('pending', 'paid')).toBe(true);
    expect(canTransition('paid', 'shipped')).toBe(true);
    expect(canTransition('shipped', 'delivered')).toBe(true);
  });

  it('should only cancel pending orders', () => {
    expect(canTransition('pending', 'cancelled')).toBe(true);
    expect(canTransition('paid', 'cancelled')).toBe(false);
    expect(canTransition('shipped', 'cancelled')).toBe(false);
  });

  it('should have no way out of terminal states', () => {
    for (const to of ORDER_STATUSES) {
      expect(canTransition('delivered', to)).toBe(false);
      expect(canTransition('cancelled', to)).toBe(false);
    }
  });

  it('should not skip steps', () => {
    expect(canTransition('pending', 'shipped')).toBe(false);
    expect(canTransition('paid', 'delivered')).toBe(false);
  });

  describe('assertTransition', () => {
    it('should return the target state for a valid edge', () => {
      expect(assertTransition('pending', 'cancelled')).toBe('cancelled');
    });

    it('should throw InvalidTransitionError otherwise', () => {
      let caught: unknown;
      try {
        assertTransition('cancelled', 'cancelled');
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(InvalidTransitionError);
      expect(caught).toMatchObject({
        code: 'INVALID_TRANSITION',
        message: "Cannot transition order from 'cancelled' to 'cancelled'",
        details: { from: 'cancelled', to: 'cancelled' },
      });
    });
  });

  it('should recognise known statuses only', () => {
    expect(isOrderStatus('shipped')).toBe(true);
    expect(isOrderStatus('refunded')).toBe(false);
  });
});
