export const LogLevels = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LogLevels)[number];

export interface LoggerPort {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LogLevels.some((level) => level === value);
}
