/**
 * Error taxonomy for the storefront checkout core
 */

/**
 * Machine-readable failure codes carried by errors and failed results.
 */
export type FailureCode =
  | 'EMPTY_CART'
  | 'VALIDATION_FAILED'
  | 'INSUFFICIENT_STOCK'
  | 'NOT_FOUND'
  | 'FORBIDDEN'
  | 'INVALID_TRANSITION'
  | 'BUSY'
  | 'TIMEOUT'
  | 'ABORTED'
  | 'STORE_FAILURE'
  | 'INTERNAL';

/**
 * Base error class for every failure the core raises on purpose
 */
export class StorefrontError extends Error {
  readonly code: FailureCode;
  readonly details: Record<string, unknown>;

  constructor(code: FailureCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'StorefrontError';
    this.code = code;
    this.details = details;
    Error.captureStackTrace?.(this, this.constructor);
  }

  /** Only store failures are worth retrying as-is */
  get retryable(): boolean {
    return this.code === 'STORE_FAILURE';
  }
}

export class EmptyCartError extends StorefrontError {
  readonly userId: number;

  constructor(userId: number) {
    super('EMPTY_CART', 'Cart is empty', { userId });
    this.name = 'EmptyCartError';
    this.userId = userId;
  }
}

export class InsufficientStockError extends StorefrontError {
  readonly product: number;
  readonly requested: number;
  readonly available: number;

  constructor(product: number, requested: number, available: number) {
    super(
      'INSUFFICIENT_STOCK',
      `Insufficient stock for product ${product}: requested ${requested}, available ${available}`,
      { product, requested, available },
    );
    this.name = 'InsufficientStockError';
    this.product = product;
    this.requested = requested;
    this.available = available;
  }
}

export type EntityName = 'user' | 'address' | 'product' | 'variant' | 'order';

export class NotFoundError extends StorefrontError {
  readonly entity: EntityName;

  constructor(entity: EntityName, id: number | string) {
    super('NOT_FOUND', `${capitalize(entity)} ${id} not found`, { entity, id });
    this.name = 'NotFoundError';
    this.entity = entity;
  }
}

export class ForbiddenError extends StorefrontError {
  constructor(message = 'Not allowed to act on this resource') {
    super('FORBIDDEN', message);
    this.name = 'ForbiddenError';
  }
}

export class InvalidTransitionError extends StorefrontError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string) {
    super('INVALID_TRANSITION', `Cannot transition order from '${from}' to '${to}'`, { from, to });
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

/**
 * Raised when a lock could not be acquired within the lock-wait timeout
 */
export class BusyError extends StorefrontError {
  readonly key: string;
  readonly waitedMs: number;

  constructor(key: string, waitedMs: number) {
    super('BUSY', `Timed out after ${waitedMs}ms waiting for lock '${key}'`, { key, waitedMs });
    this.name = 'BusyError';
    this.key = key;
    this.waitedMs = waitedMs;
  }
}

/**
 * Raised when a task deadline passes before its transaction commits
 */
export class TimeoutError extends StorefrontError {
  readonly limitMs?: number;

  constructor(limitMs?: number) {
    super(
      'TIMEOUT',
      limitMs === undefined ? 'Execution deadline exceeded' : `Execution exceeded ${limitMs}ms`,
      limitMs === undefined ? {} : { limitMs },
    );
    this.name = 'TimeoutError';
    this.limitMs = limitMs;
  }
}

export class AbortedError extends StorefrontError {
  constructor(message = 'Request was aborted before commit') {
    super('ABORTED', message);
    this.name = 'AbortedError';
  }
}

/**
 * Wraps an error thrown by the underlying database
 */
export class StoreFailureError extends StorefrontError {
  constructor(cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super('STORE_FAILURE', `Store failure: ${message}`);
    this.name = 'StoreFailureError';
    this.cause = cause;
  }
}

/**
 * Programming error: a ledger mutation was attempted without the row lock.
 */
export class LockNotHeldError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`Lock '${key}' is not held by this transaction`);
    this.name = 'LockNotHeldError';
    this.key = key;
  }
}

/**
 * Error collection for attribute validation
 */
export class ErrorCollection {
  private readonly errors: Map<string, string[]> = new Map();

  add(attribute: string, message: string): void {
    const existing = this.errors.get(attribute) ?? [];
    existing.push(message);
    this.errors.set(attribute, existing);
  }

  has(attribute: string): boolean {
    return this.errors.has(attribute);
  }

  get(attribute: string): string[] {
    return this.errors.get(attribute) ?? [];
  }

  get isEmpty(): boolean {
    return this.errors.size === 0;
  }

  get messages(): Record<string, string[]> {
    return Object.fromEntries(this.errors);
  }

  get fullMessage(): string {
    const parts: string[] = [];
    for (const [attr, msgs] of this.errors) {
      for (const msg of msgs) {
        parts.push(`${attr} ${msg}`);
      }
    }
    return parts.join('. ') + (parts.length > 0 ? '.' : '');
  }
}

export function isStorefrontError(value: unknown): value is StorefrontError {
  return value instanceof StorefrontError;
}

/**
 * Map an AbortSignal's reason to the error the aborted operation fails with.
 * A deadline (our own TimeoutError, or a DOMException named 'TimeoutError'
 * from `AbortSignal.timeout`) becomes TIMEOUT, anything else ABORTED.
 */
export function errorFromAbortReason(reason: unknown): StorefrontError {
  if (reason instanceof StorefrontError) return reason;
  if (typeof reason === 'object' && reason !== null && 'name' in reason && reason.name === 'TimeoutError') {
    return new TimeoutError();
  }
  return new AbortedError();
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
