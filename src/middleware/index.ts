/**
 * Built-in task middlewares
 */

export { TimeoutMiddleware, type TimeoutOptions } from './timeout.js';
export { CorrelateMiddleware, type CorrelateOptions } from './correlate.js';
export { RuntimeMiddleware } from './runtime.js';

export type { MiddlewareFunction, MiddlewareDefinition } from '../task.js';
