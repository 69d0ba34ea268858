// ---------------------------------------------------------------------------
// Request-scoped context via AsyncLocalStorage
// ---------------------------------------------------------------------------
//
// Set once at the HTTP boundary and read anywhere downstream: the logger
// enriches every line with it and CorrelateMiddleware stamps task results.
// ---------------------------------------------------------------------------

import { AsyncLocalStorage } from 'node:async_hooks';

export interface RequestContext {
  /** Correlation id for one inbound request */
  requestId?: string;
  /** Authenticated user, once known */
  userId?: number;
  [key: string]: unknown;
}

const storage = new AsyncLocalStorage<RequestContext>();

/**
 * Run a function within a request-scoped context.
 */
export function runInContext<T>(ctx: RequestContext, fn: () => T): T {
  return storage.run(ctx, fn);
}

/**
 * Current request context, or an empty object outside of `runInContext()`.
 */
export function getRequestContext(): RequestContext {
  return storage.getStore() ?? {};
}

/**
 * Add fields to the active context (no-op outside of one).
 */
export function extendRequestContext(fields: RequestContext): void {
  const store = storage.getStore();
  if (store) {
    Object.assign(store, fields);
  }
}
