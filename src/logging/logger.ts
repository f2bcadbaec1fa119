/**
 * Structured Logger
 *
 * Leveled logging with context enrichment, child loggers and a pluggable
 * output sink. Entries are written as JSON lines or logfmt.
 *
 * @module logging/logger
 */

// ─── Types ───────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogFormat = 'json' | 'logfmt';

export interface LogMetadata {
  [key: string]: unknown;
}

export interface LogContext {
  correlationId?: string;
  service?: string;
  operation?: string;
}

export interface ErrorInfo {
  name: string;
  message: string;
  stack?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  correlationId?: string;
  operation?: string;
  metadata?: LogMetadata;
  error?: ErrorInfo;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  fatal(message: string, error?: Error, metadata?: LogMetadata): void;
  child(context: LogContext): Logger;
}

// ─── Log Level Ordering ──────────────────────────────────────────────────────

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

// ─── Outputs ─────────────────────────────────────────────────────────────────

/**
 * Output sink for log entries. Can be replaced for testing or custom
 * transports.
 */
export type LogOutput = (entry: LogEntry) => void;

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry);
}

function logfmtValue(value: unknown): string {
  const text =
    typeof value === 'string'
      ? value
      : value instanceof Error
        ? value.message
        : JSON.stringify(value) ?? String(value);
  if (text === '' || /[\s"=\\]/.test(text)) {
    return JSON.stringify(text);
  }
  return text;
}

/**
 * Render an entry as logfmt. Metadata keys are flattened onto the line.
 */
export function formatLogfmt(entry: LogEntry): string {
  const pairs: Array<[string, unknown]> = [
    ['ts', entry.timestamp],
    ['level', entry.level],
    ['msg', entry.message],
    ['service', entry.service],
  ];
  if (entry.correlationId) pairs.push(['correlationId', entry.correlationId]);
  if (entry.operation) pairs.push(['operation', entry.operation]);
  for (const [key, value] of Object.entries(entry.metadata ?? {})) {
    pairs.push([key, value]);
  }
  if (entry.error) pairs.push(['err', entry.error.message]);

  return pairs.map(([key, value]) => `${key}=${logfmtValue(value)}`).join(' ');
}

/** Write formatted entries as lines on stdout. */
export function createStreamOutput(format: LogFormat = 'logfmt'): LogOutput {
  const render = format === 'json' ? formatJson : formatLogfmt;
  return (entry: LogEntry) => {
    process.stdout.write(render(entry) + '\n');
  };
}

// ─── Logger Options ──────────────────────────────────────────────────────────

export interface LoggerOptions {
  /** Service name included in every log entry. Defaults to 'alert-ticket-bridge'. */
  service?: string;
  /** Minimum log level to emit. Defaults to 'info'. */
  level?: LogLevel;
  /** Output format for the default sink. Ignored when `output` is given. */
  format?: LogFormat;
  /** Base context merged into every log entry. */
  context?: LogContext;
  /** Custom output sink. Defaults to stdout in `format`. */
  output?: LogOutput;
}

// ─── Implementation ──────────────────────────────────────────────────────────

export function createLogger(options: LoggerOptions = {}): Logger {
  const service = options.service ?? 'alert-ticket-bridge';
  const minLevel = options.level ?? 'info';
  const baseContext: LogContext = { ...options.context };
  const output = options.output ?? createStreamOutput(options.format);

  function shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
  }

  function buildEntry(
    level: LogLevel,
    message: string,
    error?: Error,
    metadata?: LogMetadata,
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: baseContext.service ?? service,
    };

    if (baseContext.correlationId) entry.correlationId = baseContext.correlationId;
    if (baseContext.operation) entry.operation = baseContext.operation;
    if (metadata && Object.keys(metadata).length > 0) entry.metadata = metadata;

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return entry;
  }

  function log(level: LogLevel, message: string, error?: Error, metadata?: LogMetadata): void {
    if (!shouldLog(level)) return;
    output(buildEntry(level, message, error, metadata));
  }

  return {
    debug(message: string, metadata?: LogMetadata): void {
      log('debug', message, undefined, metadata);
    },
    info(message: string, metadata?: LogMetadata): void {
      log('info', message, undefined, metadata);
    },
    warn(message: string, metadata?: LogMetadata): void {
      log('warn', message, undefined, metadata);
    },
    error(message: string, error?: Error, metadata?: LogMetadata): void {
      log('error', message, error, metadata);
    },
    fatal(message: string, error?: Error, metadata?: LogMetadata): void {
      log('fatal', message, error, metadata);
    },
    child(context: LogContext): Logger {
      return createLogger({
        service,
        level: minLevel,
        context: { ...baseContext, ...context },
        output,
      });
    },
  };
}
