import type { TimerCommand, TimerCommandKind } from "../app/TimerCommand";
import { parseDuration } from "../domain/timers/Duration";
import { InvalidArgumentError, TimerError } from "../domain/timers/TimerErrors";

export const DEFAULT_COUNT = 3;
export const DEFAULT_MESSAGE = "tick";

export const USAGE = `Usage: loop-timers <delay|interval|delayed-interval> <duration> [options]

Durations: 1500, 1500ms, 2s, 1m

Options:
  --count N         stop repeating timers after N fires (default ${DEFAULT_COUNT})
  --message TEXT    text printed on every fire (default "${DEFAULT_MESSAGE}")
  --config PATH     JSON config file
  --log-file PATH   mirror console output to a file
  --debug           log timer lifecycle events`;

export class CliUsageError extends TimerError {
  constructor(message: string) {
    super(message, "CLI_USAGE");
  }
}

export interface CommandDefaults {
  count?: number;
  message?: string;
}

const COMMAND_KINDS: readonly TimerCommandKind[] = ["delay", "interval", "delayed-interval"];

// consumed by env.ts
const VALUE_FLAGS = new Set(["--config", "--log-file"]);
const BARE_FLAGS = new Set(["--debug", "--no-debug"]);

function isCommandKind(value: string): value is TimerCommandKind {
  return COMMAND_KINDS.some((kind) => kind === value);
}

export function parseCount(raw: string): number {
  const count = Number(raw);
  if (!Number.isInteger(count) || count < 1) {
    throw new CliUsageError(`--count expects a positive integer (got "${raw}").`);
  }
  return count;
}

export function parseCommandLine(argv: string[], defaults: CommandDefaults = {}): TimerCommand {
  const positional: string[] = [];
  let count = defaults.count ?? DEFAULT_COUNT;
  let message = defaults.message ?? DEFAULT_MESSAGE;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--count":
        count = parseCount(requireValue(argv, ++i, arg));
        break;
      case "--message":
        message = requireValue(argv, ++i, arg);
        break;
      default:
        if (VALUE_FLAGS.has(arg)) {
          i++;
        } else if (BARE_FLAGS.has(arg)) {
          break;
        } else if (arg.startsWith("--")) {
          throw new CliUsageError(`Unknown option ${arg}.`);
        } else {
          positional.push(arg);
        }
        break;
    }
  }

  const [kind, duration, ...rest] = positional;
  if (!kind || !isCommandKind(kind)) {
    throw new CliUsageError(kind ? `Unknown command "${kind}".` : "Missing command.");
  }
  if (duration === undefined) {
    throw new CliUsageError(`Missing duration for ${kind}.`);
  }
  if (rest.length) {
    throw new CliUsageError(`Unexpected arguments: ${rest.join(" ")}.`);
  }

  let durationMs: number;
  try {
    durationMs = parseDuration(duration);
  } catch (err) {
    if (err instanceof InvalidArgumentError) {
      throw new CliUsageError(err.message);
    }
    throw err;
  }

  return { kind, durationMs, count, message };
}

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined) {
    throw new CliUsageError(`${flag} expects a value.`);
  }
  return value;
}
