/**
 * Result - Immutable outcome of task execution
 */

import type { Context } from './context.js';
import type { FailureCode } from './errors.js';

/**
 * Execution states
 */
export type State = 'initialized' | 'executing' | 'complete' | 'interrupted';

/**
 * Execution statuses
 */
export type Status = 'success' | 'failed';



/**
 * Result metadata
 */
export interface ResultMetadata {
  [key: string]: unknown;
  code?: FailureCode;
  details?: Record<string, unknown>;
  errors?: {
    fullMessage: string;
    messages: Record<string, string[]>;
  };
  runtime?: number;
  correlationId?: string;
}

export interface ResultOptions<T extends Record<string, unknown>> {
  taskId: string;
  taskName: string;
  context: Context<T>;
  state?: State;
  status?: Status;
  reason?: string;
  cause?: Error;
  metadata?: ResultMetadata;
}

/**
 * Immutable result object representing the outcome of task execution.
 *
 * @example
 * ```typescript
 * const result = await CheckoutTask.execute({ userId: 7, addressId: 3 }, { services });
 * if (result.failed) {
 *   console.log(result.code, result.reason);
 * }
 * ```
 */
export class Result<T extends Record<string, unknown> = Record<string, unknown>> {
  readonly taskId: string;

  /** Name of the task class that produced this result */
  readonly taskName: string;

  /** The context at the time of result creation */
  readonly context: Context<T>;

  /** Execution lifecycle state */
  readonly state: State;

  /** Business outcome status */
  readonly status: Status;

  /** Reason for failure */
  readonly reason?: string;

  /** The exception that caused the failure */
  readonly cause?: Error;

  readonly metadata: Readonly<ResultMetadata>;

  constructor(options: ResultOptions<T>) {
    this.taskId = options.taskId;
    this.taskName = options.taskName;
    this.context = options.context;
    this.state = options.state ?? 'initialized';
    this.status = options.status ?? 'success';
    this.reason = options.reason;
    this.cause = options.cause;
    this.metadata = Object.freeze({ ...options.metadata });

    Object.freeze(this);
  }

  get complete(): boolean {
    return this.state === 'complete';
  }

  get interrupted(): boolean {
    return this.state === 'interrupted';
  }

  /** Check if task has finished execution (complete or interrupted) */
  get executed(): boolean {
    return this.state === 'complete' || this.state === 'interrupted';
  }

  get success(): boolean {
    return this.status === 'success';
  }

  get failed(): boolean {
    return this.status === 'failed';
  }

  /** Failure code, `undefined` on success */
  get code(): FailureCode | undefined {
    return this.metadata.code;
  }

  toJSON(): ResultJSON {
    return {
      type: this.taskName,
      taskId: this.taskId,
      state: this.state,
      status: this.status,
      reason: this.reason,
      metadata: this.metadata,
    };
  }

  [Symbol.toStringTag] = 'Result';
}

/**
 * JSON representation of a result
 */
export interface ResultJSON {
  type: string;
  taskId: string;
  state: State;
  status: Status;
  reason?: string;
  metadata: Readonly<ResultMetadata>;
}

export function successResult<T extends Record<string, unknown>>(
  options: Omit<ResultOptions<T>, 'state' | 'status'>,
): Result<T> {
  return new Result({ ...options, state: 'complete', status: 'success' });
}

export function failedResult<T extends Record<string, unknown>>(
  options: Omit<ResultOptions<T>, 'state' | 'status'>,
): Result<T> {
  return new Result({
    ...options,
    state: 'interrupted',
    status: 'failed',
    reason: options.reason ?? 'Unspecified',
  });
}
