import type { TimerHandle } from "../domain/timers/Timer";
import type { EasyTimer } from "./EasyTimer";

export type TimerCommandKind = "delay" | "interval" | "delayed-interval";

export interface TimerCommand {
  kind: TimerCommandKind;
  durationMs: number;
  /** Fires to wait for before stopping; one-shot commands end after their single fire. */
  count: number;
  message: string;
}

export type OutputFn = (line: string) => void;

/**
 * Runs one command on the given timers and resolves with the number of fires once it
 * is done. Rejects if a callback throws during the synchronous first call.
 */
export function runTimerCommand(timers: EasyTimer, command: TimerCommand, output: OutputFn): Promise<number> {
  return new Promise((resolve) => {
    let fires = 0;

    const onFire = (timer: TimerHandle) => {
      fires += 1;
      output(`[${fires}] ${command.message}`);
      if (!timer.repeats || fires >= command.count) {
        timers.stop(timer);
        resolve(fires);
      }
    };

    switch (command.kind) {
      case "delay":
        timers.delay(command.durationMs, onFire);
        break;
      case "interval":
        timers.interval(command.durationMs, onFire);
        break;
      case "delayed-interval":
        timers.delayedInterval(command.durationMs, onFire);
        break;
    }
  });
}
