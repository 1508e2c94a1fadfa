import type { RunLoopPort } from "../../ports/sys/RunLoopPort";

/**
 * What a run loop needs from a timer: when it is due, whether it is still live,
 * and a way to deliver a fire. The loop never owns the timer.
 */
export interface SchedulableTimer {
  readonly id: string;
  readonly fireDate: number;
  readonly isValid: boolean;
  fire(now: number): void;
}

export interface TimerInfo {
  id: string;
  fireDate: number;
  intervalMs: number;
  repeats: boolean;
  isValid: boolean;
  fireCount: number;
}

export interface TimerHandle extends SchedulableTimer {
  readonly intervalMs: number;
  readonly repeats: boolean;
  readonly fireCount: number;
  start(loop: RunLoopPort): void;
  stop(loop: RunLoopPort): void;
  invalidate(): void;
  info(): TimerInfo;
}

/**
 * Zero-argument callbacks are valid here too; they simply ignore the handle.
 */
export type TimerCallback = (timer: TimerHandle) => void;
