/**
 * Structured logging for the S3 file output
 */

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Console-based logger with structured output
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;
  private name: string;

  constructor(minLevel: LogLevel = "info", name = "s3-file-output") {
    this.minLevel = minLevel;
    this.name = name;
  }

  error(message: string, context?: LogContext): void {
    this.log("error", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log("trace", message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const logMessage = formatLogLine(new Date(), level, this.name, message, context);

    switch (level) {
      case "error":
        console.error(logMessage);
        break;
      case "warn":
        console.warn(logMessage);
        break;
      case "debug":
      case "trace":
        console.debug(logMessage);
        break;
      default:
        console.log(logMessage);
    }
  }
}

/**
 * No-op logger, used by tests and embedders with their own sinks
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {
    // No-op
  }

  warn(_message: string, _context?: LogContext): void {
    // No-op
  }

  info(_message: string, _context?: LogContext): void {
    // No-op
  }

  debug(_message: string, _context?: LogContext): void {
    // No-op
  }

  trace(_message: string, _context?: LogContext): void {
    // No-op
  }
}

/**
 * `[timestamp] [LEVEL] name: message {context}`
 */
export function formatLogLine(
  timestamp: Date,
  level: LogLevel,
  name: string,
  message: string,
  context?: LogContext
): string {
  const contextStr = context ? ` ${JSON.stringify(context)}` : "";
  return `[${timestamp.toISOString()}] [${level.toUpperCase()}] ${name}: ${message}${contextStr}`;
}

/**
 * Log a failure that is being reported in place of, or after, another one.
 */
export function logSuppressed(logger: Logger, operation: string, error: unknown): void {
  logger.warn("Cleanup failed while handling an earlier error", {
    operation,
    errorName: error instanceof Error ? error.name : typeof error,
    errorMessage: error instanceof Error ? error.message : String(error),
  });
}
