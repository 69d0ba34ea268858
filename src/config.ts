/**
 * Storefront global configuration
 *
 * Settings are parsed from environment variables once at startup. The
 * configuration also owns the global middleware and callback registries that
 * every task consults.
 */

import { z } from 'zod';
import type { MiddlewareDefinition, CallbackType, CallbackDefinition } from './task.js';
import { logger, type LogLevel } from './logging/logger.js';
import { JsonFormatter, LineFormatter } from './logging/formatters/index.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z
  .object({
    NODE_ENV: z.string().optional(),
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    DATABASE_PATH: z.string().min(1).default('./data/storefront.db'),
    JWT_SECRET: z.string().min(1).optional(),
    LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    CHECKOUT_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
    EVENT_DELIVERY_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
    SSE_KEEPALIVE_MS: z.coerce.number().int().positive().default(30000),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    LOG_FORMAT: z.enum(['json', 'line']).default('json'),
    SEED_DEMO_DATA: booleanFlag.default('false'),
  })
  .superRefine((env, ctx) => {
    if (!env.JWT_SECRET && env.NODE_ENV !== 'test') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['JWT_SECRET'],
        message: 'JWT_SECRET is required',
      });
    }
  });

export type LogFormat = 'json' | 'line';

/**
 * Global configuration options
 */
export interface StorefrontConfiguration {
  // Server
  port: number;
  databasePath: string;
  jwtSecret: string;

  // Concurrency bounds
  lockTimeoutMs: number;
  checkoutTimeoutMs: number;
  deliveryTimeoutMs: number;
  keepAliveMs: number;

  // Logging
  logLevel: LogLevel;
  logFormat: LogFormat;

  seedDemoData: boolean;

  // Registries
  middlewares: MiddlewareRegistry;
  callbacks: CallbackRegistry;
}

/**
 * Middleware registry
 */
export class MiddlewareRegistry {
  private _middlewares: MiddlewareDefinition[] = [];

  get registry(): readonly MiddlewareDefinition[] {
    return this._middlewares;
  }

  register(middleware: MiddlewareDefinition): void {
    this._middlewares.push(middleware);
  }

  deregister(middleware: MiddlewareDefinition): boolean {
    const index = this._middlewares.indexOf(middleware);
    if (index === -1) return false;
    this._middlewares.splice(index, 1);
    return true;
  }

  clear(): void {
    this._middlewares = [];
  }
}

/**
 * Callback registry
 */
export class CallbackRegistry {
  private readonly _callbacks: Map<CallbackType, CallbackDefinition[]> = new Map();

  register(type: CallbackType, callback: CallbackDefinition): void {
    const existing = this._callbacks.get(type) ?? [];
    existing.push(callback);
    this._callbacks.set(type, existing);
  }

  deregister(type: CallbackType, callback: CallbackDefinition): boolean {
    const existing = this._callbacks.get(type);
    if (!existing) return false;

    const index = existing.indexOf(callback);
    if (index === -1) return false;
    existing.splice(index, 1);
    return true;
  }

  get(type: CallbackType): readonly CallbackDefinition[] {
    return this._callbacks.get(type) ?? [];
  }

  clear(): void {
    this._callbacks.clear();
  }
}

function createDefaultConfiguration(): StorefrontConfiguration {
  return {
    port: 3000,
    databasePath: './data/storefront.db',
    jwtSecret: 'test-secret',
    lockTimeoutMs: 5000,
    checkoutTimeoutMs: 15000,
    deliveryTimeoutMs: 2000,
    keepAliveMs: 30000,
    logLevel: 'info',
    logFormat: 'json',
    seedDemoData: false,
    middlewares: new MiddlewareRegistry(),
    callbacks: new CallbackRegistry(),
  };
}

let configuration: StorefrontConfiguration = createDefaultConfiguration();

export function getConfiguration(): StorefrontConfiguration {
  return configuration;
}

/**
 * Mutate the global configuration in place.
 *
 * @example
 * ```typescript
 * configure((config) => {
 *   config.lockTimeoutMs = 250;
 *   config.middlewares.register(RuntimeMiddleware);
 * });
 * ```
 */
export function configure(fn: (config: StorefrontConfiguration) => void): void {
  fn(configuration);
}

export function resetConfiguration(): void {
  configuration = createDefaultConfiguration();
}

/**
 * Parse environment variables into the global configuration and point the
 * root logger at the configured level and format.
 *
 * @throws ZodError when a variable is malformed or JWT_SECRET is missing
 */
export function loadConfiguration(
  env: Record<string, string | undefined> = process.env,
): StorefrontConfiguration {
  const parsed = EnvSchema.parse(env);

  configure((config) => {
    config.port = parsed.PORT;
    config.databasePath = parsed.DATABASE_PATH;
    config.jwtSecret = parsed.JWT_SECRET ?? 'test-secret';
    config.lockTimeoutMs = parsed.LOCK_TIMEOUT_MS;
    config.checkoutTimeoutMs = parsed.CHECKOUT_TIMEOUT_MS;
    config.deliveryTimeoutMs = parsed.EVENT_DELIVERY_TIMEOUT_MS;
    config.keepAliveMs = parsed.SSE_KEEPALIVE_MS;
    config.logLevel = parsed.LOG_LEVEL;
    config.logFormat = parsed.LOG_FORMAT;
    config.seedDemoData = parsed.SEED_DEMO_DATA;
  });

  logger.configure({
    level: parsed.LOG_LEVEL,
    formatter: parsed.LOG_FORMAT === 'line' ? new LineFormatter() : new JsonFormatter(),
  });

  return configuration;
}
