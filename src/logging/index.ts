/**
 * Structured logging with pluggable formatters.
 */

export {
  Logger,
  createLogger,
  LOG_LEVELS,
  type LogLevel,
  type LogEntry,
  type LogFields,
  type LogOutput,
  type LoggerOptions,
} from './logger.js';

export { type LogFormatter, LineFormatter, JsonFormatter } from './formatters/index.js';
