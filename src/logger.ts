import { CONFIG } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case "debug":
      return "debug";
    case "warn":
    case "warning":
      return "warn";
    case "error":
      return "error";
    case "silent":
    case "none":
      return "silent";
    case "info":
    default:
      return "info";
  }
}

// stdout belongs to the MCP stdio transport, so everything goes to stderr.
export class Logger {
  constructor(private readonly level: LogLevel) {}

  private enabled(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.level];
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.enabled(level)) {
      return;
    }
    const timestamp = new Date().toISOString();
    console.error(`${timestamp} ${message}`, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write("debug", message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write("info", message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write("warn", message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write("error", message, args);
  }
}

export const logger = new Logger(parseLogLevel(CONFIG.logLevel));
