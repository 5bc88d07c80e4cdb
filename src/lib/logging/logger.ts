import {
  DEFAULT_REDACT_PATTERNS,
  LOG_LEVELS,
  type ILogger,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
  type LoggerContext,
} from "./types";

export class Logger implements ILogger {
  private config: LoggerConfig;
  private redactPatterns: RegExp[];

  constructor(config: LoggerConfig) {
    this.config = config;
    this.redactPatterns = config.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log("fatal", message, data, error);
  }

  child(context: LoggerContext): ILogger {
    return new Logger({
      ...this.config,
      redactPatterns: this.redactPatterns,
      component: context.component ?? this.config.component,
      correlationId: context.correlationId ?? this.config.correlationId,
    });
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
    };
    if (this.config.correlationId) {
      entry.correlationId = this.config.correlationId;
    }
    if (data) {
      entry.data = this.redact(data);
    }
    if (error !== undefined) {
      entry.error =
        error instanceof Error
          ? { name: error.name, message: error.message, stack: error.stack }
          : { name: "Unknown", message: String(error) };
    }

    for (const transport of this.config.transports) {
      if (LOG_LEVELS[level] >= LOG_LEVELS[transport.minLevel]) {
        try {
          transport.log(entry);
        } catch (e) {
          console.error(`[Logger] Transport ${transport.name} failed:`, e);
        }
      }
    }
  }

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      if (this.redactPatterns.some((pattern) => pattern.test(key))) {
        result[key] = "[REDACTED]";
      } else if (isPlainRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Drops everything. Default for library consumers that pass no logger. */
export const silentLogger: ILogger = new Logger({
  minLevel: "silent",
  component: "silent",
  transports: [],
});
