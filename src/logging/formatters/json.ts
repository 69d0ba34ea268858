/**
 * JSON Formatter - one compact JSON object per line
 */

import type { LogRecord } from '../logger.js';
import type { LogFormatter } from './types.js';

/**
 * @example
 * {"level":"info","timestamp":"2024-05-01T10:00:00.000Z","pid":42,"progname":"storefront","service":"checkout","msg":"Order placed","orderId":"..."}
 */
export class JsonFormatter implements LogFormatter {
  private readonly pretty: boolean;

  constructor(options?: { pretty?: boolean }) {
    this.pretty = options?.pretty ?? false;
  }

  format(record: LogRecord): string {
    const { level, timestamp, pid, progname, msg, fields } = record;

    const obj: Record<string, unknown> = {
      level,
      timestamp: timestamp.toISOString(),
      pid,
      progname,
      ...fields,
      msg,
    };

    return JSON.stringify(obj, replaceErrors, this.pretty ? 2 : undefined);
  }
}

function replaceErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}
