import { assertDuration } from "../domain/timers/Duration";
import type { FirePolicy } from "../domain/timers/FirePolicy";
import { policyName } from "../domain/timers/FirePolicy";
import { LoopTimer } from "../domain/timers/LoopTimer";
import type { TimerCallback } from "../domain/timers/Timer";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { TimePort } from "../ports/sys/TimePort";

export class TimerFactory {
  constructor(
    private readonly time: TimePort,
    private readonly logger?: LoggerPort
  ) {}

  /**
   * Builds an unstarted timer whose first fire is `durationMs` from now.
   *
   * When the policy does not delay, the callback also runs once right here, before the
   * timer is returned. For a non-repeating policy that means two calls in total: this
   * one and the scheduled one.
   */
  buildTimer(durationMs: number, policy: FirePolicy, callback: TimerCallback): LoopTimer {
    assertDuration(durationMs);

    const timer = new LoopTimer({
      fireDate: this.time.now() + durationMs,
      intervalMs: durationMs,
      repeats: policy.repeats,
      callback,
    });

    this.logger?.debug("Timer built", {
      id: timer.id,
      policy: policyName(policy),
      durationMs,
      fireDate: timer.fireDate,
    });

    if (!policy.delays) {
      callback(timer);
    }
    return timer;
  }
}
