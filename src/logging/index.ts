/**
 * Logging Module
 *
 * Structured, leveled logging in JSON or logfmt.
 */

export {
  type LogLevel,
  type LogFormat,
  type LogMetadata,
  type LogContext,
  type ErrorInfo,
  type LogEntry,
  type Logger,
  type LogOutput,
  type LoggerOptions,
  createLogger,
  createStreamOutput,
  formatJson,
  formatLogfmt,
} from './logger.js';
