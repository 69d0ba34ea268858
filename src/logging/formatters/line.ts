/**
 * Line Formatter - traditional single-line log format
 */

import type { LogRecord } from '../logger.js';
import type { LogFormatter } from './types.js';

/**
 * @example
 * I, [2024-05-01T10:00:00.000Z #42] INFO -- storefront: Order placed service="checkout" orderId="..."
 */
export class LineFormatter implements LogFormatter {
  format(record: LogRecord): string {
    const { level, timestamp, pid, progname, msg, fields } = record;
    const levelChar = level.charAt(0).toUpperCase();

    const parts: string[] = [msg];
    for (const [key, value] of Object.entries(fields)) {
      if (value === undefined) continue;
      parts.push(`${key}=${formatValue(value)}`);
    }

    return `${levelChar}, [${timestamp.toISOString()} #${pid}] ${level.toUpperCase()} -- ${progname}: ${parts.join(' ')}`;
  }
}

function formatValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return `"${escapeString(value)}"`;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Error) return `"${escapeString(`${value.name}: ${value.message}`)}"`;
  return `"${escapeString(JSON.stringify(value))}"`;
}

function escapeString(str: string): string {
  return str.replace(/"/g, '\\"').replace(/\n/g, '\\n');
}
