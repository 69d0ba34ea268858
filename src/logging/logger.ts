/**
 * Structured logger with pluggable formatters.
 *
 * Every line is enriched with the active request context (requestId, userId)
 * from AsyncLocalStorage, so code downstream of the HTTP boundary never has to
 * thread those ids through by hand.
 */

import { getRequestContext } from '../request-context.js';
import type { LogFormatter } from './formatters/types.js';
import { JsonFormatter } from './formatters/json.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A single log line before formatting
 */
export interface LogRecord {
  level: LogLevel;
  timestamp: Date;
  pid: number;
  progname: string;
  msg: string;
  fields: Record<string, unknown>;
}

export interface LoggerOptions {
  /** Output stream (default: process.stdout) */
  output?: NodeJS.WritableStream;
  /** Log formatter (default: JsonFormatter) */
  formatter?: LogFormatter;
  /** Program name (default: 'storefront') */
  progname?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Enable/disable logging (default: true) */
  enabled?: boolean;
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Settings shared by a root logger and all of its children */
export interface LoggerSink {
  output: NodeJS.WritableStream;
  formatter: LogFormatter;
  progname: string;
  level: LogLevel;
  enabled: boolean;
}

export class Logger {
  private readonly sink: LoggerSink;
  private readonly staticContext: Record<string, unknown>;

  constructor(
    options: LoggerOptions = {},
    staticContext: Record<string, unknown> = {},
    sink?: LoggerSink,
  ) {
    this.sink = sink ?? {
      output: options.output ?? process.stdout,
      formatter: options.formatter ?? new JsonFormatter(),
      progname: options.progname ?? 'storefront',
      level: options.level ?? 'info',
      enabled: options.enabled ?? true,
    };
    this.staticContext = staticContext;
  }

  /**
   * Child logger with extra static fields. Children follow later
   * reconfiguration of their root (level, formatter, output).
   */
  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger({}, { ...this.staticContext, ...additionalContext }, this.sink);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.write('debug', msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.write('info', msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.write('warn', msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.write('error', msg, data);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.sink.enabled && LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.sink.level];
  }

  configure(options: LoggerOptions): void {
    if (options.output) this.sink.output = options.output;
    if (options.formatter) this.sink.formatter = options.formatter;
    if (options.progname) this.sink.progname = options.progname;
    if (options.level) this.sink.level = options.level;
    if (options.enabled !== undefined) this.sink.enabled = options.enabled;
  }

  private write(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;

    // static context < request context < per-call data
    const record: LogRecord = {
      level,
      timestamp: new Date(),
      pid: process.pid,
      progname: this.sink.progname,
      msg,
      fields: { ...this.staticContext, ...getRequestContext(), ...data },
    };

    this.sink.output.write(this.sink.formatter.format(record) + '\n');
  }
}

/**
 * Process-wide root logger. Configured once at startup from the
 * storefront configuration.
 */
export const logger = new Logger();

/**
 * Logger bound to one component, e.g. `createServiceLogger('checkout')`.
 */
export function createServiceLogger(service: string): Logger {
  return logger.child({ service });
}
