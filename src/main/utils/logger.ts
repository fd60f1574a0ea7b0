/**
 * Structured Logger Utility
 *
 * One JSON line per entry: warnings and errors to stderr, the rest to stdout.
 * Each service logs through its own `createLogger(service)` instance; the
 * minimum level is shared and follows `LOG_LEVEL` until the config service
 * sets it.
 *
 * @module main/utils/logger
 * @security LM-001: Structured logging, no row contents beyond offending values
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  context?: LogContext;
}

// ============================================================================
// Level Handling
// ============================================================================

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

function resolveInitialLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

/** Dates and errors do not survive JSON.stringify on their own */
function toJsonValue(value: unknown): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

// ============================================================================
// Logger
// ============================================================================

export class LogSink {
  private minLevel: LogLevel = resolveInitialLevel();

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  write(level: LogLevel, service: string, message: string, context?: LogContext): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const entry: LogEntry = { timestamp: new Date().toISOString(), level, service, message };
    if (context && Object.keys(context).length > 0) {
      entry.context = Object.fromEntries(
        Object.entries(context).map(([key, value]) => [key, toJsonValue(value)])
      );
    }

    // Streams rather than console: console methods can throw on a closed pipe
    const stream = LEVEL_PRIORITY[level] >= LEVEL_PRIORITY.warn ? process.stderr : process.stdout;
    if (stream.writable) {
      stream.write(JSON.stringify(entry) + '\n');
    }
  }
}

/**
 * Logger bound to one service name
 */
export class ServiceLogger {
  constructor(
    private readonly sink: LogSink,
    private readonly service: string
  ) {}

  debug(message: string, context?: LogContext): void {
    this.sink.write('debug', this.service, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.sink.write('info', this.service, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.sink.write('warn', this.service, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.sink.write('error', this.service, message, context);
  }
}

// ============================================================================
// Singleton Export
// ============================================================================

/** Process-wide sink; `setLevel` applies to every service logger */
export const logger = new LogSink();

export function createLogger(service: string): ServiceLogger {
  return new ServiceLogger(logger, service);
}
