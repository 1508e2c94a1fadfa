import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";

export interface LoggingHandle {
  readonly logPath?: string;
  shutdown(): Promise<void>;
}

type ConsoleMethod = "log" | "debug" | "info" | "warn" | "error";

function formatArg(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  try {
    return JSON.stringify(arg) ?? String(arg);
  } catch {
    return String(arg);
  }
}

/**
 * Mirrors console output into `logFile` (appending) until `shutdown` restores the console.
 */
export function initializeLogging(logFile?: string): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: () => Promise.resolve(),
    };
  }

  const resolvedLog = path.resolve(logFile);
  const logDir = path.dirname(resolvedLog);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  const startedAt = new Date().toISOString();
  stream.write(`[${startedAt}] --- loop-timers session started ---\n`);

  const original: Record<ConsoleMethod, (...args: unknown[]) => void> = {
    log: console.log.bind(console),
    debug: console.debug.bind(console),
    info: console.info.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
  };

  const mirror = (level: ConsoleMethod) =>
    (...args: unknown[]) => {
      original[level](...args);
      const timestamp = new Date().toISOString();
      stream.write(`[${timestamp}] ${level.toUpperCase()} ${args.map(formatArg).join(" ")}\n`);
    };

  stream.on("error", (err) => {
    original.error(`Log file ${resolvedLog} is no longer writable:`, err);
  });

  console.log = mirror("log");
  console.debug = mirror("debug");
  console.info = mirror("info");
  console.warn = mirror("warn");
  console.error = mirror("error");

  const shutdown = () => {
    console.log = original.log;
    console.debug = original.debug;
    console.info = original.info;
    console.warn = original.warn;
    console.error = original.error;
    const endedAt = new Date().toISOString();
    stream.write(`[${endedAt}] --- loop-timers session ended ---\n`);
    return new Promise<void>((resolve) => {
      stream.end(() => resolve());
    });
  };

  return {
    logPath: resolvedLog,
    shutdown,
  };
}
