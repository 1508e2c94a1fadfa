import type { RunLoopPort } from "../../ports/sys/RunLoopPort";
import { RunLoopModes } from "../../ports/sys/RunLoopPort";
import { assertDuration } from "./Duration";
import type { TimerCallback, TimerHandle, TimerInfo } from "./Timer";
import { InvalidArgumentError } from "./TimerErrors";

let timerCounter = 0;

export interface LoopTimerInit {
  fireDate: number;
  intervalMs: number;
  repeats: boolean;
  callback: TimerCallback;
}

/**
 * Next slot on the fixed grid `fireDate + k * intervalMs` that lies after `now`.
 * Periods the loop slept through are skipped rather than replayed.
 */
export function nextFireDateAfter(fireDate: number, intervalMs: number, now: number): number {
  let next = fireDate + intervalMs;
  if (next <= now) {
    const missed = Math.floor((now - next) / intervalMs) + 1;
    next += missed * intervalMs;
  }
  return next;
}

export class LoopTimer implements TimerHandle {
  readonly id: string;
  readonly intervalMs: number;
  readonly repeats: boolean;

  private nextFireDate: number;
  private valid = true;
  private fires = 0;
  private firing = false;
  private readonly callback: TimerCallback;

  constructor(init: LoopTimerInit) {
    if (!Number.isFinite(init.fireDate)) {
      throw new InvalidArgumentError(`fireDate must be finite (got ${init.fireDate}).`);
    }
    this.intervalMs = assertDuration(init.intervalMs, "intervalMs");
    // a zero period cannot repeat
    this.repeats = init.repeats && init.intervalMs > 0;
    this.nextFireDate = init.fireDate;
    this.callback = init.callback;
    this.id = `timer-${++timerCounter}`;
  }

  get fireDate(): number {
    return this.nextFireDate;
  }

  get isValid(): boolean {
    return this.valid;
  }

  get fireCount(): number {
    return this.fires;
  }

  /** A delivery made while this timer's own callback is still running is ignored. */
  fire(now: number): void {
    if (!this.valid || this.firing) return;
    this.fires += 1;
    this.firing = true;
    try {
      this.callback(this);
    } finally {
      this.firing = false;
      if (!this.repeats) {
        this.invalidate();
      } else if (this.valid) {
        this.nextFireDate = nextFireDateAfter(this.nextFireDate, this.intervalMs, now);
      }
    }
  }

  start(loop: RunLoopPort): void {
    loop.addTimer(this, RunLoopModes.Default);
  }

  stop(loop: RunLoopPort): void {
    this.invalidate();
    loop.removeTimer(this, RunLoopModes.Default);
  }

  invalidate(): void {
    this.valid = false;
  }

  info(): TimerInfo {
    return {
      id: this.id,
      fireDate: this.nextFireDate,
      intervalMs: this.intervalMs,
      repeats: this.repeats,
      isValid: this.valid,
      fireCount: this.fires,
    };
  }
}
