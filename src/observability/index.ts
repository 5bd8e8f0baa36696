/**
 * Logging for the SES client.
 */

import { randomUUID } from 'crypto';

/**
 * Log levels.
 */
export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.Debug, LogLevel.Info, LogLevel.Warn, LogLevel.Error];

/**
 * Log entry structure.
 */
export interface LogEntry {
  /** Log level. */
  level: LogLevel;
  /** Log message. */
  message: string;
  /** Timestamp. */
  timestamp: Date;
  /** Request context. */
  context?: RequestContext;
  /** Additional fields. */
  fields?: Record<string, unknown>;
}

/**
 * Per-call context attached to log lines.
 */
export interface RequestContext {
  /** Unique ID of the call. */
  requestId: string;
  /** Operation name, e.g. the SES action. */
  operation: string;
  /** Start time. */
  startTime: Date;
}

/**
 * Creates a new request context.
 */
export function createRequestContext(operation: string): RequestContext {
  return {
    requestId: randomUUID(),
    operation,
    startTime: new Date(),
  };
}

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, error?: Error, fields?: Record<string, unknown>): void;
  withContext(context: RequestContext): Logger;
}

/**
 * Destination for formatted log lines.
 */
export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case LogLevel.Debug:
      console.debug(line);
      break;
    case LogLevel.Info:
      console.info(line);
      break;
    case LogLevel.Warn:
      console.warn(line);
      break;
    case LogLevel.Error:
      console.error(line);
      break;
  }
};

/**
 * Console logger implementation.
 *
 * Writes one line per entry:
 * `<ISO timestamp> [LEVEL] [requestId] [operation] message {fields}`.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly context?: RequestContext;
  private readonly sink: LogSink;

  constructor(minLevel: LogLevel = LogLevel.Info, context?: RequestContext, sink: LogSink = consoleSink) {
    this.minLevel = minLevel;
    this.context = context;
    this.sink = sink;
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, fields);
  }

  error(message: string, error?: Error, fields?: Record<string, unknown>): void {
    const errorFields = error ? { error: error.message, stack: error.stack } : {};
    this.log(LogLevel.Error, message, { ...fields, ...errorFields });
  }

  withContext(context: RequestContext): Logger {
    return new ConsoleLogger(this.minLevel, context, this.sink);
  }

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    this.sink(
      level,
      this.formatEntry({
        level,
        message,
        timestamp: new Date(),
        context: this.context,
        fields,
      })
    );
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.minLevel);
  }

  private formatEntry(entry: LogEntry): string {
    const parts: string[] = [entry.timestamp.toISOString(), `[${entry.level.toUpperCase()}]`];

    if (entry.context) {
      parts.push(`[${entry.context.requestId}]`);
      parts.push(`[${entry.context.operation}]`);
    }

    parts.push(entry.message);

    if (entry.fields && Object.keys(entry.fields).length > 0) {
      parts.push(JSON.stringify(entry.fields));
    }

    return parts.join(' ');
  }
}

/**
 * No-op logger that discards all logs.
 */
export class NoopLogger implements Logger {
  debug(): void {
    // No-op
  }
  info(): void {
    // No-op
  }
  warn(): void {
    // No-op
  }
  error(): void {
    // No-op
  }
  withContext(_context: RequestContext): Logger {
    return this;
  }
}
