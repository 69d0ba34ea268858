/**
 * Structured logging with pluggable formatters.
 */

export {
  Logger,
  logger,
  createServiceLogger,
  type LogLevel,
  type LogRecord,
  type LoggerOptions,
  type LoggerSink,
} from './logger.js';

export { type LogFormatter, LineFormatter, JsonFormatter } from './formatters/index.js';
