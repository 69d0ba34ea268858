/**
 * Task - Base class for the storefront's business operations
 */

import { v7 as uuidv7 } from 'uuid';
import { Context, createContext } from './context.js';
import {
  Result,
  successResult,
  failedResult,
  type State,
  type Status,
  type ResultMetadata,
} from './result.js';
import { ErrorCollection, StorefrontError } from './errors.js';
import { getConfiguration } from './config.js';
import { createServiceLogger, type LogLevel } from './logging/logger.js';
import type { Services } from './services.js';

const log = createServiceLogger('task');

export type AttributeType = 'string' | 'integer' | 'number' | 'boolean' | 'array' | 'object';

/**
 * Attribute definition for required/optional helpers
 */
export interface AttributeDefinition {
  required?: boolean;
  type?: AttributeType | AttributeType[];
  default?: unknown;
  description?: string;
  presence?: boolean | { message?: string };
  format?: RegExp | { with: RegExp; message?: string };
  numeric?: {
    min?: number;
    max?: number;
    message?: string;
  };
  inclusion?: { in: readonly unknown[]; message?: string };
}

export type AttributesSchema = Record<string, AttributeDefinition>;

export interface TaskSettings {
  /** Level used to log a successful result (failures always log at warn) */
  logLevel?: LogLevel;
  tags?: string[];
}

export type CallbackType =
  | 'beforeValidation'
  | 'beforeExecution'
  | 'onComplete'
  | 'onInterrupted'
  | 'onExecuted'
  | 'onSuccess'
  | 'onFailed';

/**
 * The surface of a running task that callbacks and middlewares may touch
 */
export interface TaskHandle {
  readonly id: string;
  readonly taskName: string;
  readonly signal: AbortSignal;
  readonly status: Status;
  abort(reason: unknown): void;
  addMetadata(metadata: ResultMetadata): void;
}

/**
 * A method name on the task, a function, or an object with `call`
 */
export type CallbackDefinition =
  | string
  | ((task: TaskHandle) => void | Promise<void>)
  | { call: (task: TaskHandle) => void | Promise<void> };

export type CallbacksConfig = Partial<Record<CallbackType, CallbackDefinition[]>>;

/**
 * Middleware wraps the task's validation, work and callbacks. It may
 * annotate the result through `task.addMetadata` once `next` settles.
 */
export type MiddlewareFunction = (task: TaskHandle, next: () => Promise<void>) => Promise<void>;

export type MiddlewareDefinition = MiddlewareFunction | { call: MiddlewareFunction };

export interface TaskClass<T extends Record<string, unknown> = Record<string, unknown>> {
  new (): Task<T>;
  readonly name: string;
  attributes?: AttributesSchema;
  settings?: TaskSettings;
  callbacks?: CallbacksConfig;
  middlewares?: MiddlewareDefinition[];
}

export interface ExecuteOptions<T extends Record<string, unknown> = Record<string, unknown>> {
  /** Store and broadcaster the task works against */
  services?: Services;
  /** Caller cancellation, e.g. the HTTP request's signal */
  signal?: AbortSignal;
  context?: Context<T>;
}

/**
 * Internal halt signal for `fail()`
 */
class HaltSignal extends Error {
  readonly metadata: ResultMetadata;

  constructor(reason: string, metadata: ResultMetadata = {}) {
    super(reason);
    this.metadata = metadata;
  }
}

/**
 * Base Task class.
 *
 * @example
 * ```typescript
 * class ReleaseHold extends Task<{ released: number }> {
 *   static override attributes = {
 *     productId: required({ type: 'integer', numeric: { min: 1 } }),
 *   };
 *
 *   declare productId: number;
 *
 *   async work() {
 *     if (!(await this.services.store.hasProduct(this.productId))) {
 *       this.fail('Product not found', { code: 'NOT_FOUND' });
 *     }
 *     this.context.set('released', 1);
 *   }
 * }
 *
 * const result = await ReleaseHold.execute({ productId: 12 }, { services });
 * ```
 */
export abstract class Task<TContext extends Record<string, unknown> = Record<string, unknown>>
  implements TaskHandle
{
  readonly id: string;

  /** Shared context for this execution */
  context: Context<TContext>;

  /** Validation errors */
  readonly errors: ErrorCollection;

  private _state: State = 'initialized';
  private _status: Status = 'success';
  private _reason?: string;
  private _cause?: Error;
  private _metadata: ResultMetadata = {};
  private _services?: Services;
  private readonly controller = new AbortController();
  private readonly unlinks: Array<() => void> = [];

  // Static configuration (override in subclasses)
  static attributes?: AttributesSchema;
  static settings?: TaskSettings;
  static callbacks?: CallbacksConfig;
  static middlewares?: MiddlewareDefinition[];

  constructor() {
    this.id = uuidv7();
    this.context = createContext<TContext>();
    this.errors = new ErrorCollection();
  }

  /**
   * The business logic. Throw a `StorefrontError` or call `fail()` to
   * end with a failed result.
   */
  abstract work(): void | Promise<void>;

  /**
   * Fail task execution with a reason and metadata.
   */
  protected fail(reason: string, metadata?: ResultMetadata): never {
    throw new HaltSignal(reason, metadata);
  }

  get taskName(): string {
    return this.constructor.name;
  }

  get status(): Status {
    return this._status;
  }

  get taskClass(): TaskClass<TContext> {
    const ctor: unknown = this.constructor;
    if (!isTaskClass<TContext>(ctor)) {
      throw new Error(`${this.taskName} is not a Task class`);
    }
    return ctor;
  }

  get settings(): TaskSettings {
    return this.taskClass.settings ?? {};
  }

  /**
   * The services passed to `execute`.
   *
   * @throws Error when the task was executed without services
   */
  protected get services(): Services {
    if (!this._services) {
      throw new Error(`${this.taskName} was executed without services`);
    }
    return this._services;
  }

  /** Aborted by the caller's signal or by a deadline middleware */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  abort(reason: unknown): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason);
    }
  }

  addMetadata(metadata: ResultMetadata): void {
    this._metadata = { ...this._metadata, ...metadata };
  }

  /**
   * Execute the task and return a Result. Business failures never throw.
   */
  static async execute<T extends Record<string, unknown>>(
    this: TaskClass<T>,
    args?: Record<string, unknown>,
    options?: ExecuteOptions<T>,
  ): Promise<Result<T>> {
    const task = new this();
    return task._execute(args ?? {}, options ?? {});
  }

  private async _execute(
    args: Record<string, unknown>,
    options: ExecuteOptions<TContext>,
  ): Promise<Result<TContext>> {
    if (options.context) {
      this.context = options.context;
    }
    this._services = options.services;
    if (options.signal) {
      this.linkSignal(options.signal);
    }

    this._applyAttributes(args);

    try {
      await this._executeWithMiddleware();
    } finally {
      for (const unlink of this.unlinks) unlink();
    }

    const result = this._createResult();
    this._logResult(result);
    return result;
  }

  private linkSignal(signal: AbortSignal): void {
    if (signal.aborted) {
      this.abort(signal.reason);
      return;
    }
    const onAbort = (): void => this.abort(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    this.unlinks.push(() => signal.removeEventListener('abort', onAbort));
  }

  /**
   * Global middlewares are outermost, then the class's own.
   */
  private async _executeWithMiddleware(): Promise<void> {
    const middlewares = [
      ...getConfiguration().middlewares.registry,
      ...(this.taskClass.middlewares ?? []),
    ];

    let next = (): Promise<void> => this._executeCore();

    for (let i = middlewares.length - 1; i >= 0; i--) {
      const middleware = middlewares[i];
      if (!middleware) continue;
      const fn: MiddlewareFunction =
        typeof middleware === 'function' ? middleware : (task, n) => middleware.call(task, n);
      const currentNext = next;
      next = () => fn(this, currentNext);
    }

    try {
      await next();
    } catch (error) {
      this._recordError(error);
    }
  }

  private async _executeCore(): Promise<void> {
    try {
      await this._runCallbacks('beforeValidation');

      this._validateAttributes();

      if (!this.errors.isEmpty) {
        this._state = 'interrupted';
        this._status = 'failed';
        this._reason = this.errors.fullMessage;
        this._metadata = {
          ...this._metadata,
          code: 'VALIDATION_FAILED',
          details: this.errors.messages,
          errors: {
            fullMessage: this.errors.fullMessage,
            messages: this.errors.messages,
          },
        };
      } else {
        await this._runCallbacks('beforeExecution');

        this._state = 'executing';
        await this.work();

        this._state = 'complete';
        this._status = 'success';
      }
    } catch (error) {
      this._recordError(error);
    }

    await this._runLifecycleCallbacks();
  }

  private _recordError(error: unknown): void {
    this._state = 'interrupted';
    this._status = 'failed';

    if (error instanceof HaltSignal) {
      this._reason = error.message;
      this._metadata = { ...this._metadata, code: 'INTERNAL', ...error.metadata };
    } else if (error instanceof StorefrontError) {
      this._reason = error.message;
      this._cause = error;
      this._metadata = { ...this._metadata, code: error.code, details: error.details };
    } else if (error instanceof Error) {
      this._reason = `[${error.name}] ${error.message}`;
      this._cause = error;
      this._metadata = { ...this._metadata, code: 'INTERNAL' };
    } else {
      this._reason = String(error);
      this._metadata = { ...this._metadata, code: 'INTERNAL' };
    }
  }

  private _applyAttributes(args: Record<string, unknown>): void {
    for (const [name, def] of Object.entries(this.taskClass.attributes ?? {})) {
      let value = args[name];
      if (value === undefined && def.default !== undefined) {
        value = typeof def.default === 'function' ? def.default() : def.default;
      }
      Reflect.set(this, name, value);
    }
  }

  private _validateAttributes(): void {
    for (const [name, def] of Object.entries(this.taskClass.attributes ?? {})) {
      const value: unknown = Reflect.get(this, name);

      if (value === undefined || value === null) {
        if (def.required) {
          this.errors.add(name, 'is required');
        }
        continue;
      }

      if (def.type) {
        const types = Array.isArray(def.type) ? def.type : [def.type];
        if (!types.some((type) => matchesType(value, type))) {
          this.errors.add(name, `must be of type ${types.join(' or ')}`);
          continue;
        }
      }

      if (def.presence && typeof value === 'string' && value.trim() === '') {
        const msg = typeof def.presence === 'object' ? def.presence.message : undefined;
        this.errors.add(name, msg ?? "can't be blank");
      }

      if (def.format) {
        const pattern = def.format instanceof RegExp ? def.format : def.format.with;
        const msg = def.format instanceof RegExp ? undefined : def.format.message;
        if (!pattern.test(String(value))) {
          this.errors.add(name, msg ?? 'is invalid');
        }
      }

      if (def.numeric && typeof value === 'number') {
        const { min, max, message } = def.numeric;
        if (min !== undefined && value < min) {
          this.errors.add(name, message ?? `must be greater than or equal to ${min}`);
        }
        if (max !== undefined && value > max) {
          this.errors.add(name, message ?? `must be less than or equal to ${max}`);
        }
      }

      if (def.inclusion && !def.inclusion.in.includes(value)) {
        this.errors.add(name, def.inclusion.message ?? 'is not included in the list');
      }
    }
  }

  /**
   * Class callbacks first, then globally registered ones
   */
  private async _runCallbacks(type: CallbackType): Promise<void> {
    const callbacks = [
      ...(this.taskClass.callbacks?.[type] ?? []),
      ...getConfiguration().callbacks.get(type),
    ];

    for (const callback of callbacks) {
      if (typeof callback === 'string') {
        const method: unknown = Reflect.get(this, callback);
        if (typeof method !== 'function') {
          throw new Error(`${this.taskName} has no callback method '${callback}'`);
        }
        await method.call(this);
      } else if (typeof callback === 'function') {
        await callback(this);
      } else {
        await callback.call(this);
      }
    }
  }

  private async _runLifecycleCallbacks(): Promise<void> {
    await this._runCallbacks(this._state === 'complete' ? 'onComplete' : 'onInterrupted');
    await this._runCallbacks('onExecuted');
    await this._runCallbacks(this._status === 'success' ? 'onSuccess' : 'onFailed');
  }

  private _createResult(): Result<TContext> {
    const options = {
      taskId: this.id,
      taskName: this.taskName,
      context: this.context,
      reason: this._reason,
      cause: this._cause,
      metadata: this._metadata,
    };
    return this._status === 'success' ? successResult(options) : failedResult(options);
  }

  private _logResult(result: Result<TContext>): void {
    const data = { ...result.toJSON(), tags: this.settings.tags };
    if (result.success) {
      log[this.settings.logLevel ?? 'info']('Task succeeded', data);
    } else {
      log.warn('Task failed', data);
    }
  }

  [Symbol.toStringTag] = 'Task';
}

function matchesType(value: unknown, type: AttributeType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return Number.isInteger(value);
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return typeof value === 'object' && !Array.isArray(value);
  }
}

function isTaskClass<T extends Record<string, unknown>>(value: unknown): value is TaskClass<T> {
  return typeof value === 'function' && value.prototype instanceof Task;
}

/**
 * Define a required attribute
 */
export function required(options: Omit<AttributeDefinition, 'required'> = {}): AttributeDefinition {
  return { ...options, required: true };
}

/**
 * Define an optional attribute
 */
export function optional(options: Omit<AttributeDefinition, 'required'> = {}): AttributeDefinition {
  return { ...options, required: false };
}
