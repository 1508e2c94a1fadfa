import type { SchedulableTimer } from "../../domain/timers/Timer";
import type { TimePort } from "./TimePort";

export const RunLoopModes = {
  Default: "default",
  Common: "common",
} as const;

export type RunLoopMode = (typeof RunLoopModes)[keyof typeof RunLoopModes];

/**
 * The event loop timers attach to. Implementations call `timer.fire(now)` at or after
 * `timer.fireDate`, one fire at a time per timer, and keep re-arming it while it stays
 * valid and attached under at least one mode.
 */
export interface RunLoopPort extends TimePort {
  addTimer(timer: SchedulableTimer, mode: RunLoopMode): void;
  removeTimer(timer: SchedulableTimer, mode: RunLoopMode): void;
  containsTimer(timer: SchedulableTimer, mode: RunLoopMode): boolean;
}
