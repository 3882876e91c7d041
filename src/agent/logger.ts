/**
 * Leveled logger.
 *
 * No external deps. Wraps console with level filtering and an optional
 * prefix, so each connection can tag its lines with its id and address.
 * Level comes from the constructor or the AGENT_LOG_LEVEL env var.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const levelOrder: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const levelLabels: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO",
  warn: "WARN",
  error: "ERROR",
};

function isLogLevel(value: string): value is LogLevel {
  return value in levelOrder;
}

export function parseLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? "").toLowerCase();
  return isLogLevel(normalized) ? normalized : "info";
}

export class Logger {
  readonly level: LogLevel;
  private threshold: number;
  private prefix: string;

  constructor(level?: string, prefix = "") {
    this.level = parseLevel(level ?? process.env.AGENT_LOG_LEVEL);
    this.threshold = levelOrder[this.level];
    this.prefix = prefix;
  }

  /** Returns a logger at the same level that tags every line with `prefix`. */
  withPrefix(prefix: string): Logger {
    return new Logger(this.level, this.prefix ? `${this.prefix} ${prefix}` : prefix);
  }

  debug(msg: string, ...args: unknown[]): void { this.log("debug", msg, ...args); }
  info(msg: string, ...args: unknown[]): void  { this.log("info", msg, ...args); }
  warn(msg: string, ...args: unknown[]): void  { this.log("warn", msg, ...args); }
  error(msg: string, ...args: unknown[]): void { this.log("error", msg, ...args); }

  private log(level: LogLevel, msg: string, ...args: unknown[]): void {
    if (levelOrder[level] < this.threshold) return;

    const timestamp = new Date().toISOString();
    const formatted = args.length > 0 ? `${msg} ${args.map(String).join(" ")}` : msg;
    const tagged = this.prefix ? `[${this.prefix}] ${formatted}` : formatted;
    const line = `${timestamp} [${levelLabels[level]}] ${tagged}`;

    if (level === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}
