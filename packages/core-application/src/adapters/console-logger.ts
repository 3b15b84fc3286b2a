import type { Logger, LogLevel, LogMeta } from "../ports/logger";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel = "info") {}

  debug(message: string, meta?: LogMeta): void {
    this.write("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write("warn", message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.write("error", message, meta);
  }

  private write(level: LogLevel, message: string, meta?: LogMeta) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const line = `[${new Date().toISOString()}] ${level.toUpperCase()} ${message}`;
    const args = meta && Object.keys(meta).length > 0 ? [line, meta] : [line];

    if (level === "error") console.error(...args);
    else if (level === "warn") console.warn(...args);
    else console.log(...args);
  }
}
