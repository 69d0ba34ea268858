/**
 * Timeout Middleware - Bound how long a task may run before it commits
 */

import { TimeoutError } from '../errors.js';
import type { MiddlewareFunction, TaskHandle } from '../task.js';

export interface TimeoutOptions {
  /** Deadline in milliseconds, or a function resolving it per task */
  ms: number | ((task: TaskHandle) => number);
}

/**
 * Arms a deadline that aborts the task's signal with a `TimeoutError`.
 * Work already committed stays committed; an uncommitted transaction is
 * rolled back by the store when it sees the aborted signal.
 *
 * @example
 * ```typescript
 * class CheckoutTask extends Task {
 *   static override middlewares = [
 *     TimeoutMiddleware({ ms: () => getConfiguration().checkoutTimeoutMs }),
 *   ];
 * }
 * ```
 */
export function TimeoutMiddleware(options: TimeoutOptions): MiddlewareFunction {
  return async (task, next) => {
    const limitMs = typeof options.ms === 'function' ? options.ms(task) : options.ms;
    const timer = setTimeout(() => task.abort(new TimeoutError(limitMs)), limitMs);

    try {
      await next();
    } finally {
      clearTimeout(timer);
    }
  };
}
