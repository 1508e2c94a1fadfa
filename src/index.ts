import { NodeRunLoop } from "./adapters/sys/NodeRunLoop";
import { EasyTimer } from "./app/EasyTimer";
import type { FirePolicy } from "./domain/timers/FirePolicy";
import type { LoopTimer } from "./domain/timers/LoopTimer";
import type { TimerCallback, TimerHandle } from "./domain/timers/Timer";
import type { RunLoopPort } from "./ports/sys/RunLoopPort";

export { ConsoleLogger } from "./adapters/sys/ConsoleLogger";
export { ManualRunLoop, type ManualRunLoopOptions } from "./adapters/sys/ManualRunLoop";
export { NodeRunLoop, type NodeRunLoopOptions } from "./adapters/sys/NodeRunLoop";
export { EasyTimer } from "./app/EasyTimer";
export { TimerFactory } from "./app/TimerFactory";
export { assertDuration, minutes, parseDuration, seconds, type DurationMs } from "./domain/timers/Duration";
export { FirePolicies, policyName, type FirePolicy, type FirePolicyName } from "./domain/timers/FirePolicy";
export { LoopTimer, nextFireDateAfter } from "./domain/timers/LoopTimer";
export type { SchedulableTimer, TimerCallback, TimerHandle, TimerInfo } from "./domain/timers/Timer";
export { InvalidArgumentError, TimerError } from "./domain/timers/TimerErrors";
export type { LogLevel, LoggerPort } from "./ports/sys/LoggerPort";
export { RunLoopModes, type RunLoopMode, type RunLoopPort } from "./ports/sys/RunLoopPort";
export type { TimePort } from "./ports/sys/TimePort";

// The only implicit "current loop" in the package; everything below src/ takes the loop explicitly.
let current: RunLoopPort | null = null;

export function currentRunLoop(): RunLoopPort {
  if (!current) {
    current = new NodeRunLoop();
  }
  return current;
}

/**
 * Replaces the loop the helpers below default to. Passing null drops the current one,
 * detaching its timers when it is a NodeRunLoop.
 */
export function setCurrentRunLoop(loop: RunLoopPort | null): void {
  if (current instanceof NodeRunLoop && current !== loop) {
    current.shutdown();
  }
  current = loop;
}

export function timer(
  durationMs: number,
  policy: FirePolicy,
  callback: TimerCallback,
  loop: RunLoopPort = currentRunLoop()
): LoopTimer {
  return new EasyTimer(loop).timer(durationMs, policy, callback);
}

export function delay(durationMs: number, callback: TimerCallback, loop: RunLoopPort = currentRunLoop()): LoopTimer {
  return new EasyTimer(loop).delay(durationMs, callback);
}

export function interval(durationMs: number, callback: TimerCallback, loop: RunLoopPort = currentRunLoop()): LoopTimer {
  return new EasyTimer(loop).interval(durationMs, callback);
}

export function delayedInterval(
  durationMs: number,
  callback: TimerCallback,
  loop: RunLoopPort = currentRunLoop()
): LoopTimer {
  return new EasyTimer(loop).delayedInterval(durationMs, callback);
}

export function start(handle: TimerHandle, loop: RunLoopPort = currentRunLoop()): void {
  handle.start(loop);
}

export function stop(handle: TimerHandle, loop: RunLoopPort = currentRunLoop()): void {
  handle.stop(loop);
}
