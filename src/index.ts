/**
 * Storefront checkout core
 *
 * @example
 * ```typescript
 * import { openDatabase, runMigration, Store, EventBroadcaster, CheckoutTask } from 'storefront-checkout';
 *
 * const db = await openDatabase(':memory:');
 * runMigration(db);
 * const services = { store: new Store(db), broadcaster: new EventBroadcaster() };
 *
 * const result = await CheckoutTask.execute({ userId: 2, addressId: 1 }, { services });
 * if (result.success) {
 *   console.log(result.context.require('order').totalAmount.toString());
 * }
 * ```
 */

// Task runtime
export {
  Task,
  required,
  optional,
  type TaskClass,
  type TaskHandle,
  type TaskSettings,
  type AttributeDefinition,
  type AttributesSchema,
  type CallbackType,
  type CallbackDefinition,
  type CallbacksConfig,
  type MiddlewareFunction,
  type MiddlewareDefinition,
  type ExecuteOptions,
} from './task.js';
export { Context, createContext } from './context.js';
export {
  Result,
  successResult,
  failedResult,
  type State,
  type Status,
  type ResultMetadata,
  type ResultJSON,
} from './result.js';
export { RuntimeMiddleware, CorrelateMiddleware, TimeoutMiddleware } from './middleware/index.js';

// Configuration
export {
  configure,
  getConfiguration,
  resetConfiguration,
  loadConfiguration,
  MiddlewareRegistry,
  CallbackRegistry,
  type StorefrontConfiguration,
} from './config.js';

// Errors
export * from './errors.js';

// Domain
export { Money, InvalidMoneyError } from './domain/money.js';
export * from './domain/order-status.js';
export { orderToJSON, orderTotal, type Order, type OrderLine, type OrderJSON } from './domain/order.js';
export * from './domain/events.js';

// Store
export { Db, openDatabase, runMigration, withTransaction, SCHEMA, type RunResult, type SqlParam } from './store/database.js';
export { Store, TransactionSession, type StoreOptions } from './store/store.js';
export { StockLedger } from './store/stock-ledger.js';
export { LockManager } from './store/lock-manager.js';
export { loadSeedFile, seedDemoData, type SeedData } from './store/seed.js';

// Coordinators
export { CheckoutTask, type CheckoutContext } from './tasks/checkout.task.js';
export { CancelOrderTask, type CancelOrderContext } from './tasks/cancel-order.task.js';
export { UpdateOrderStatusTask } from './tasks/update-order-status.task.js';

// Events
export { EventBroadcaster, type Observer, type ObserverHandle } from './events/broadcaster.js';

// HTTP
export { createApp, type AppOptions } from './http/app.js';

// Logging
export * from './logging/index.js';

export type { Services } from './services.js';
