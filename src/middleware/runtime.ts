/**
 * Runtime Middleware - Track task execution time
 */

import { performance } from 'node:perf_hooks';
import type { MiddlewareFunction } from '../task.js';

/**
 * Records execution time in milliseconds, from a monotonic clock, as
 * `metadata.runtime`.
 *
 * @example
 * ```typescript
 * class CheckoutTask extends Task {
 *   static override middlewares = [RuntimeMiddleware];
 * }
 * ```
 */
export const RuntimeMiddleware: MiddlewareFunction = async (task, next) => {
  const startTime = performance.now();
  try {
    await next();
  } finally {
    task.addMetadata({ runtime: Math.round(performance.now() - startTime) });
  }
};
