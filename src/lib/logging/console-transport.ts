import type { LogEntry, LogLevel, LogTransport } from "./types";

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  white: "\x1b[37m",
  gray: "\x1b[90m",
  bgRed: "\x1b[41m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.gray,
  debug: COLORS.cyan,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.bgRed + COLORS.white,
  silent: COLORS.reset,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  trace: "TRC",
  debug: "DBG",
  info: "INF",
  warn: "WRN",
  error: "ERR",
  fatal: "FTL",
  silent: "   ",
};

export interface ConsoleTransportOptions {
  minLevel?: LogLevel;
  /** Default: true when stderr is a TTY */
  colors?: boolean;
  /** Emit one JSON object per line instead of the human-readable format */
  json?: boolean;
}

/**
 * Writes to stderr so CLI output on stdout stays machine-readable.
 */
export class ConsoleTransport implements LogTransport {
  name = "console";
  minLevel: LogLevel;
  private colors: boolean;
  private json: boolean;

  constructor(options: ConsoleTransportOptions = {}) {
    this.minLevel = options.minLevel ?? "debug";
    this.colors = options.colors ?? process.stderr.isTTY === true;
    this.json = options.json ?? false;
  }

  log(entry: LogEntry): void {
    process.stderr.write(this.format(entry) + "\n");
  }

  format(entry: LogEntry): string {
    if (this.json) {
      return JSON.stringify(entry);
    }

    const parts: string[] = [
      this.paint(COLORS.dim, entry.timestamp.substring(11, 23)),
      this.paint(LEVEL_COLORS[entry.level], LEVEL_LABELS[entry.level]),
      this.paint(COLORS.gray, `[${entry.component}]`),
    ];
    if (entry.correlationId) {
      parts.push(this.paint(COLORS.gray, `(${entry.correlationId.substring(0, 8)})`));
    }
    parts.push(entry.message);
    if (entry.data && Object.keys(entry.data).length > 0) {
      parts.push(this.paint(COLORS.dim, JSON.stringify(entry.data)));
    }
    if (entry.error) {
      parts.push(this.paint(COLORS.red, `${entry.error.name}: ${entry.error.message}`));
    }
    return parts.join(" ");
  }

  private paint(color: string, text: string): string {
    return this.colors ? `${color}${text}${COLORS.reset}` : text;
  }
}
