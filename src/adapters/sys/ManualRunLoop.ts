import type { SchedulableTimer } from "../../domain/timers/Timer";
import { assertDuration } from "../../domain/timers/Duration";
import { InvalidArgumentError, TimerError } from "../../domain/timers/TimerErrors";
import type { RunLoopMode, RunLoopPort } from "../../ports/sys/RunLoopPort";

export interface ManualRunLoopOptions {
  startTime?: number;
}

/**
 * Run loop on a virtual clock for deterministic tests and simulations.
 *
 * Nothing fires until the clock is advanced. Due timers fire in fire-date order,
 * ties in attachment order, and callback errors propagate to the caller. A callback
 * may advance the clock itself; its own timer is skipped until that fire returns.
 *
 * @example
 * ```ts
 * const loop = new ManualRunLoop();
 * const timers = new EasyTimer(loop);
 * timers.delay(100, () => console.log("fired"));
 * loop.advanceBy(100); // fired
 * ```
 */
export class ManualRunLoop implements RunLoopPort {
  private currentTime: number;
  private readonly registrations = new Map<SchedulableTimer, Set<RunLoopMode>>();
  private readonly inFlight = new Set<SchedulableTimer>();

  constructor(options: ManualRunLoopOptions = {}) {
    this.currentTime = options.startTime ?? 0;
    if (!Number.isFinite(this.currentTime)) {
      throw new InvalidArgumentError(`startTime must be finite (got ${this.currentTime}).`);
    }
  }

  now(): number {
    return this.currentTime;
  }

  addTimer(timer: SchedulableTimer, mode: RunLoopMode): void {
    if (!timer.isValid) return;
    const modes = this.registrations.get(timer);
    if (modes) {
      modes.add(mode);
      return;
    }
    this.registrations.set(timer, new Set([mode]));
  }

  removeTimer(timer: SchedulableTimer, mode: RunLoopMode): void {
    const modes = this.registrations.get(timer);
    if (!modes) return;
    modes.delete(mode);
    if (modes.size === 0) {
      this.registrations.delete(timer);
    }
  }

  containsTimer(timer: SchedulableTimer, mode: RunLoopMode): boolean {
    return this.registrations.get(timer)?.has(mode) ?? false;
  }

  pendingCount(): number {
    this.pruneInvalid();
    return this.registrations.size;
  }

  nextFireDate(): number | null {
    this.pruneInvalid();
    let next: number | null = null;
    for (const timer of this.registrations.keys()) {
      if (this.inFlight.has(timer)) continue;
      if (next === null || timer.fireDate < next) {
        next = timer.fireDate;
      }
    }
    return next;
  }

  /**
   * Moves the clock forward by `ms`, firing everything that comes due.
   * @returns the number of fires delivered
   */
  advanceBy(ms: number): number {
    return this.advanceTo(this.currentTime + assertDuration(ms, "ms"));
  }

  advanceTo(targetTime: number): number {
    if (!Number.isFinite(targetTime) || targetTime < this.currentTime) {
      throw new InvalidArgumentError(
        `Cannot move the clock from ${this.currentTime} to ${targetTime}.`
      );
    }

    let fired = 0;
    for (let timer = this.nextDue(targetTime); timer; timer = this.nextDue(targetTime)) {
      if (timer.fireDate > this.currentTime) {
        this.currentTime = timer.fireDate;
      }
      this.fireOne(timer);
      fired += 1;
    }

    // a callback may have advanced past targetTime already
    this.currentTime = Math.max(this.currentTime, targetTime);
    return fired;
  }

  /**
   * Advances from fire date to fire date until nothing is attached.
   * Repeating timers never go idle, hence the cap.
   */
  runUntilIdle(maxFires = 10_000): number {
    let fired = 0;
    for (let next = this.nextFireDate(); next !== null; next = this.nextFireDate()) {
      if (fired >= maxFires) {
        throw new TimerError(`Run loop still busy after ${maxFires} fires.`, "LOOP_NOT_IDLE");
      }
      fired += this.advanceTo(Math.max(next, this.currentTime));
    }
    return fired;
  }

  private nextDue(targetTime: number): SchedulableTimer | undefined {
    this.pruneInvalid();
    let due: SchedulableTimer | undefined;
    for (const timer of this.registrations.keys()) {
      if (timer.fireDate > targetTime || this.inFlight.has(timer)) continue;
      if (!due || timer.fireDate < due.fireDate) {
        due = timer;
      }
    }
    return due;
  }

  private fireOne(timer: SchedulableTimer) {
    const scheduledFor = timer.fireDate;
    this.inFlight.add(timer);
    try {
      timer.fire(this.currentTime);
    } finally {
      this.inFlight.delete(timer);
      if (!timer.isValid) {
        this.registrations.delete(timer);
      }
    }
    if (timer.isValid && this.registrations.has(timer) && timer.fireDate <= scheduledFor) {
      throw new TimerError(`Timer ${timer.id} did not advance past ${scheduledFor}.`, "TIMER_STUCK");
    }
  }

  private pruneInvalid() {
    for (const timer of Array.from(this.registrations.keys())) {
      if (!timer.isValid) {
        this.registrations.delete(timer);
      }
    }
  }
}
