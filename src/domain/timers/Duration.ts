import { InvalidArgumentError } from "./TimerErrors";

/**
 * Milliseconds as a plain number. Whole milliseconds are exact; fractional periods
 * accumulate floating-point error along a repeating timer's grid, so a fire date such
 * as `3 * 0.1` lands slightly after the clock value written the same way.
 */
export type DurationMs = number;

export const MS_PER_SECOND = 1_000;
export const MS_PER_MINUTE = 60_000;

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)(ms|s|m)?$/;

export function assertDuration(durationMs: number, name = "durationMs"): DurationMs {
  if (!Number.isFinite(durationMs) || durationMs < 0) {
    throw new InvalidArgumentError(
      `${name} must be a finite, non-negative number of milliseconds (got ${durationMs}).`
    );
  }
  return durationMs;
}

export function seconds(value: number): DurationMs {
  return assertDuration(value * MS_PER_SECOND, "seconds");
}

export function minutes(value: number): DurationMs {
  return assertDuration(value * MS_PER_MINUTE, "minutes");
}

/**
 * Parses `1500`, `1500ms`, `2s` or `1.5m` into milliseconds.
 */
export function parseDuration(text: string): DurationMs {
  const match = DURATION_PATTERN.exec(text.trim());
  if (!match) {
    throw new InvalidArgumentError(`Unrecognized duration "${text}"; use e.g. 500, 500ms, 2s or 1m.`);
  }
  const value = Number(match[1]);
  switch (match[2]) {
    case "s":
      return seconds(value);
    case "m":
      return minutes(value);
    default:
      return assertDuration(value);
  }
}
