import type { LogLevel, LoggerPort } from "../../ports/sys/LoggerPort";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
  const payload = meta && Object.keys(meta).length ? `${message} ${JSON.stringify(meta)}` : message;
  switch (level) {
    case "debug":
      return console.debug(payload);
    case "info":
      return console.info(payload);
    case "warn":
      return console.warn(payload);
    case "error":
      return console.error(payload);
  }
}

export class ConsoleLogger implements LoggerPort {
  constructor(private readonly minLevel: LogLevel = "info") {}

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write("debug", message, meta);
  }
  info(message: string, meta?: Record<string, unknown>): void {
    this.write("info", message, meta);
  }
  warn(message: string, meta?: Record<string, unknown>): void {
    this.write("warn", message, meta);
  }
  error(message: string, meta?: Record<string, unknown>): void {
    this.write("error", message, meta);
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) return;
    log(level, message, meta);
  }
}
