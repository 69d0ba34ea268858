/**
 * Context - Shared mutable state container for task execution
 */

/**
 * Typed key-value store shared by a task, its callbacks and its middlewares.
 * Tasks publish their outputs here (the created order, the events to emit)
 * and callers read them back from `result.context`.
 */
export class Context<T extends Record<string, unknown> = Record<string, unknown>> {
  private readonly values: Partial<T> = {};

  constructor(initial?: Partial<T>) {
    if (initial) {
      this.merge(initial);
    }
  }

  get<K extends keyof T>(key: K): T[K] | undefined {
    return this.values[key];
  }

  /**
   * Read a value that the task is known to have set.
   *
   * @throws Error when the key is absent
   */
  require<K extends keyof T>(key: K): T[K] & ({} | null) {
    const value = this.values[key];
    if (value === undefined) {
      throw new Error(`Context value '${String(key)}' is not set`);
    }
    return value;
  }

  set<K extends keyof T>(key: K, value: T[K]): this {
    this.values[key] = value;
    return this;
  }

  /**
   * Merge another object into context, ignoring undefined values
   */
  merge(data: Partial<T>): this {
    for (const [key, value] of Object.entries(data)) {
      if (value !== undefined) {
        Reflect.set(this.values, key, value);
      }
    }
    return this;
  }

  [Symbol.toStringTag] = 'Context';
}

export function createContext<T extends Record<string, unknown> = Record<string, unknown>>(
  initial?: Partial<T>,
): Context<T> {
  return new Context<T>(initial);
}
