/**
 * Log Formatter Types
 */

import type { LogRecord } from '../logger.js';

export interface LogFormatter {
  format(record: LogRecord): string;
}
