import { describe, it, expect } from 'vitest';
import { errorBody, failureResponse, httpStatusFor } from './errors.js';
import { failedResult } from '../result.js';
import { createContext } from '../context.js';

describe('HTTP error mapping', () => {
  it('should map failure codes to statuses', () => {
    expect(httpStatusFor('EMPTY_CART')).toBe(400);
    expect(httpStatusFor('VALIDATION_FAILED')).toBe(422);
    expect(httpStatusFor('INSUFFICIENT_STOCK')).toBe(409);
    expect(httpStatusFor('NOT_FOUND')).toBe(404);
    expect(httpStatusFor('FORBIDDEN')).toBe(403);
    expect(httpStatusFor('INVALID_TRANSITION')).toBe(409);
    expect(httpStatusFor('BUSY')).toBe(409);
    expect(httpStatusFor('TIMEOUT')).toBe(408);
    expect(httpStatusFor('ABORTED')).toBe(408);
    expect(httpStatusFor('STORE_FAILURE')).toBe(503);
    expect(httpStatusFor('INTERNAL')).toBe(500);
  });

  it('should omit empty details', () => {
    expect(errorBody('EMPTY_CART', 'Cart is empty', {})).toEqual({
      error: { code: 'EMPTY_CART', message: 'Cart is empty' },
    });
  });

  it('should build a response from a failed result', () => {
    const result = failedResult({
      taskId: 't-1',
      taskName: 'CheckoutTask',
      context: createContext(),
      reason: 'Insufficient stock for product 7: requested 3, available 1',
      metadata: { code: 'INSUFFICIENT_STOCK', details: { product: 7, requested: 3, available: 1 } },
    });

    expect(failureResponse(result)).toEqual({
      status: 409,
      body: {
        error: {
          code: 'INSUFFICIENT_STOCK',
          message: 'Insufficient stock for product 7: requested 3, available 1',
          details: { product: 7, requested: 3, available: 1 },
        },
      },
    });
  });

  it('should hide the reason of internal failures', () => {
    const result = failedResult({
      taskId: 't-2',
      taskName: 'CheckoutTask',
      context: createContext(),
      reason: '[TypeError] cannot read properties of undefined',
      metadata: { code: 'INTERNAL' },
    });

    expect(failureResponse(result)).toEqual({
      status: 500,
      body: { error: { code: 'INTERNAL', message: 'Internal server error' } },
    });
  });
});
