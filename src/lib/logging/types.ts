export const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** e.g. "pipeline", "llm.generation", "classifier" */
  component: string;
  message: string;
  correlationId?: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LogTransport {
  name: string;
  minLevel: LogLevel;
  log(entry: LogEntry): void;
}

export interface LoggerConfig {
  minLevel: LogLevel;
  component: string;
  correlationId?: string;
  transports: LogTransport[];
  /** Keys matching any of these are replaced with "[REDACTED]" */
  redactPatterns?: RegExp[];
}

export interface LoggerContext {
  component?: string;
  correlationId?: string;
}

export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void;
  child(context: LoggerContext): ILogger;
}

// Description text and prompts are user content; keep them out of log sinks
// unless an operator wires a transport that wants them.
export const DEFAULT_REDACT_PATTERNS = [
  /apiKey/i,
  /api_key/i,
  /secret/i,
  /token$/i,
  /authorization/i,
  /^prompt$/i,
  /^systemPrompt$/i,
  /^userMessage$/i,
  /^description$/i,
];
