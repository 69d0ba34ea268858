/**
 * Errors Tests
 */

import { describe, it, expect } from 'vitest';
import {
  AbortedError,
  BusyError,
  EmptyCartError,
  ErrorCollection,
  InsufficientStockError,
  NotFoundError,
  StoreFailureError,
  StorefrontError,
  TimeoutError,
  errorFromAbortReason,
  isStorefrontError,
} from './errors.js';

describe('Errors', () => {
  describe('StorefrontError', () => {
    it('should carry a code and details', () => {
      const error = new StorefrontError('FORBIDDEN', 'Nope', { reason: 'test' });

      expect(error).toBeInstanceOf(Error);
      expect(error.code).toBe('FORBIDDEN');
      expect(error.details).toEqual({ reason: 'test' });
      expect(error.stack).toBeDefined();
    });

    it('should only mark store failures retryable', () => {
      expect(new StoreFailureError(new Error('disk I/O error')).retryable).toBe(true);
      expect(new BusyError('product:1', 50).retryable).toBe(false);
    });
  });

  describe('taxonomy', () => {
    it('should describe an empty cart', () => {
      const error = new EmptyCartError(3);

      expect(error.code).toBe('EMPTY_CART');
      expect(error.message).toBe('Cart is empty');
      expect(error.details).toEqual({ userId: 3 });
    });

    it('should name the short product', () => {
      const error = new InsufficientStockError(7, 3, 1);

      expect(error.code).toBe('INSUFFICIENT_STOCK');
      expect(error.message).toBe('Insufficient stock for product 7: requested 3, available 1');
      expect(error.details).toEqual({ product: 7, requested: 3, available: 1 });
    });

    it('should name the missing entity', () => {
      const error = new NotFoundError('address', 12);

      expect(error.message).toBe('Address 12 not found');
      expect(error.entity).toBe('address');
    });

    it('should report the lock wait', () => {
      expect(new BusyError('cart:2', 250).message).toBe("Timed out after 250ms waiting for lock 'cart:2'");
    });

    it('should prefix store failures', () => {
      const cause = new Error('database is locked');
      const error = new StoreFailureError(cause);

      expect(error.message).toBe('Store failure: database is locked');
      expect(error.cause).toBe(cause);
    });

    it('should describe a deadline with or without its limit', () => {
      expect(new TimeoutError(100).message).toBe('Execution exceeded 100ms');
      expect(new TimeoutError().message).toBe('Execution deadline exceeded');
      expect(new TimeoutError().details).toEqual({});
    });
  });

  describe('errorFromAbortReason', () => {
    it('should pass storefront errors through', () => {
      const reason = new TimeoutError(10);

      expect(errorFromAbortReason(reason)).toBe(reason);
    });

    it('should map a DOM timeout to TIMEOUT', () => {
      expect(errorFromAbortReason(new DOMException('timed out', 'TimeoutError')).code).toBe('TIMEOUT');
    });

    it('should map anything else to ABORTED', () => {
      expect(errorFromAbortReason(new DOMException('aborted', 'AbortError'))).toBeInstanceOf(AbortedError);
      expect(errorFromAbortReason(undefined).code).toBe('ABORTED');
    });
  });

  it('should recognise storefront errors', () => {
    expect(isStorefrontError(new AbortedError())).toBe(true);
    expect(isStorefrontError(new Error('plain'))).toBe(false);
  });

  describe('ErrorCollection', () => {
    it('should start empty', () => {
      const errors = new ErrorCollection();

      expect(errors.isEmpty).toBe(true);
      expect(errors.fullMessage).toBe('');
    });

    it('should group messages per attribute', () => {
      const errors = new ErrorCollection();
      errors.add('userId', 'is required');
      errors.add('addressId', 'must be of type integer');
      errors.add('userId', 'is invalid');

      expect(errors.has('userId')).toBe(true);
      expect(errors.get('userId')).toEqual(['is required', 'is invalid']);
      expect(errors.get('missing')).toEqual([]);
      expect(errors.messages).toEqual({
        userId: ['is required', 'is invalid'],
        addressId: ['must be of type integer'],
      });
      expect(errors.fullMessage).toBe(
        'userId is required. userId is invalid. addressId must be of type integer.',
      );
    });
  });
});
