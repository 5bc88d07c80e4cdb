export { Logger, silentLogger } from "./logger";
export { ConsoleTransport, type ConsoleTransportOptions } from "./console-transport";
export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type LoggerContext,
  type ILogger,
} from "./types";
