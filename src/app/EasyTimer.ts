import type { FirePolicy } from "../domain/timers/FirePolicy";
import { FirePolicies } from "../domain/timers/FirePolicy";
import type { LoopTimer } from "../domain/timers/LoopTimer";
import type { TimerCallback, TimerHandle } from "../domain/timers/Timer";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { RunLoopPort } from "../ports/sys/RunLoopPort";
import { RunLoopModes } from "../ports/sys/RunLoopPort";
import { TimerFactory } from "./TimerFactory";

/**
 * Named timer policies bound to one run loop. Every method except `timer` returns a
 * handle that is already attached to the loop.
 */
export class EasyTimer {
  private readonly factory: TimerFactory;

  constructor(
    readonly loop: RunLoopPort,
    private readonly logger?: LoggerPort
  ) {
    this.factory = new TimerFactory(loop, logger);
  }

  /** Lower-level constructor: builds the timer but leaves starting it to the caller. */
  timer(durationMs: number, policy: FirePolicy, callback: TimerCallback): LoopTimer {
    return this.factory.buildTimer(durationMs, policy, callback);
  }

  /** Fires once, `durationMs` from now. */
  delay(durationMs: number, callback: TimerCallback): LoopTimer {
    return this.schedule(durationMs, FirePolicies.Delay, callback);
  }

  /** Fires now, then every `durationMs`. */
  interval(durationMs: number, callback: TimerCallback): LoopTimer {
    return this.schedule(durationMs, FirePolicies.Interval, callback);
  }

  /** Fires every `durationMs`, starting `durationMs` from now. */
  delayedInterval(durationMs: number, callback: TimerCallback): LoopTimer {
    return this.schedule(durationMs, FirePolicies.DelayedInterval, callback);
  }

  start(timer: TimerHandle): void {
    timer.start(this.loop);
    this.logger?.debug("Timer started", { id: timer.id, attached: this.isAttached(timer) });
  }

  stop(timer: TimerHandle): void {
    timer.stop(this.loop);
    this.logger?.debug("Timer stopped", { id: timer.id, fireCount: timer.fireCount });
  }

  isAttached(timer: TimerHandle): boolean {
    return this.loop.containsTimer(timer, RunLoopModes.Default);
  }

  private schedule(durationMs: number, policy: FirePolicy, callback: TimerCallback): LoopTimer {
    const timer = this.factory.buildTimer(durationMs, policy, callback);
    this.start(timer);
    return timer;
  }
}
