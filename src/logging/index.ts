/**
 * Structured logging for request building and response parsing.
 */

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";
export type LogFormat = "pretty" | "json" | "compact";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error"];

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
  includeTimestamps: boolean;
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/** Where formatted lines go; `console.log` unless a test swaps it. */
export type LogSink = (line: string) => void;

export function createDefaultLoggingConfig(): LoggingConfig {
  return {
    level: "info",
    format: "pretty",
    includeTimestamps: true,
  };
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/** bigint is not JSON-serializable; render it as its decimal string. */
function stringifyContext(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => (typeof v === "bigint" ? v.toString() : v));
}

/**
 * Console-based logger with structured output.
 */
export class ConsoleLogger implements Logger {
  private readonly config: LoggingConfig;

  constructor(
    config?: Partial<LoggingConfig>,
    private readonly sink: LogSink = (line) => console.log(line)
  ) {
    this.config = { ...createDefaultLoggingConfig(), ...config };
  }

  trace(message: string, context?: LogContext): void {
    this.log("trace", message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log("error", message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) {
      return;
    }

    const timestamp = this.config.includeTimestamps ? new Date().toISOString() : undefined;

    if (this.config.format === "json") {
      this.sink(stringifyContext({ timestamp, level, message, ...context }));
    } else if (this.config.format === "compact") {
      const contextStr = context ? ` ${stringifyContext(context)}` : "";
      this.sink(`[${level.toUpperCase()}] ${message}${contextStr}`);
    } else {
      const parts: string[] = [];
      if (timestamp) parts.push(`[${timestamp}]`);
      parts.push(`[${level.toUpperCase()}]`);
      parts.push(message);
      if (context) {
        parts.push(
          "\n  " +
            Object.entries(context)
              .map(([k, v]) => `${k}: ${stringifyContext(v)}`)
              .join("\n  ")
        );
      }
      this.sink(parts.join(" "));
    }
  }
}

/**
 * Logger used when logging is disabled.
 */
export class NoopLogger implements Logger {
  trace(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  error(_message: string, _context?: LogContext): void {}
}

/**
 * Pick a logger for the given settings.
 */
export function createLogger(options: { enableLogging: boolean; logLevel: LogLevel }, sink?: LogSink): Logger {
  if (!options.enableLogging) return new NoopLogger();
  return new ConsoleLogger({ level: options.logLevel }, sink);
}

/**
 * Logs a built REST request.
 */
export function logRequest(logger: Logger, method: string, path: string, queryParameters: number): void {
  logger.debug("Built request", { method, path, queryParameters });
}

/**
 * Logs a decoded response.
 */
export function logResponse(logger: Logger, resource: string, status: number): void {
  logger.debug("Parsed response", { resource, status });
}

/**
 * Logs an error with context.
 */
export function logError(logger: Logger, error: Error, context: string): void {
  const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
  logger.debug("Error occurred", {
    context,
    errorName: error.name,
    errorCode: code,
    errorMessage: error.message,
  });
}
