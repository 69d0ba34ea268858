/**
 * Correlate Middleware - Tie task results to the request that caused them
 */

import { v7 as uuidv7 } from 'uuid';
import { getRequestContext } from '../request-context.js';
import type { MiddlewareFunction, TaskHandle } from '../task.js';

export interface CorrelateOptions {
  /** Correlation ID or function to resolve one (default: the request id) */
  id?: string | ((task: TaskHandle) => string | undefined);
}

/**
 * Adds `metadata.correlationId`. Falls back from the configured id to the
 * request id in the current request context, then to a fresh UUID.
 *
 * @example
 * ```typescript
 * configure((config) => {
 *   config.middlewares.register(CorrelateMiddleware());
 * });
 * ```
 */
export function CorrelateMiddleware(options: CorrelateOptions = {}): MiddlewareFunction {
  return async (task, next) => {
    const configured = typeof options.id === 'function' ? options.id(task) : options.id;
    const requestId = getRequestContext().requestId;
    const correlationId = configured ?? requestId ?? uuidv7();

    try {
      await next();
    } finally {
      task.addMetadata({ correlationId });
    }
  };
}
