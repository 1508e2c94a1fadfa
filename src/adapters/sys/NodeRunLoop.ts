import type { SchedulableTimer } from "../../domain/timers/Timer";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { RunLoopMode, RunLoopPort } from "../../ports/sys/RunLoopPort";
import { ConsoleLogger } from "./ConsoleLogger";

const MAX_TIMEOUT_MS = 2_147_483_647; // ~24.8 days

type Registration = {
  timer: SchedulableTimer;
  modes: Set<RunLoopMode>;
  timeout: NodeJS.Timeout | null;
};

export interface NodeRunLoopOptions {
  /** When false, pending timers do not keep the process alive. */
  keepAlive?: boolean;
  logger?: LoggerPort;
}

export class NodeRunLoop implements RunLoopPort {
  private readonly registrations = new Map<SchedulableTimer, Registration>();
  private readonly keepAlive: boolean;
  private readonly logger: LoggerPort;

  constructor(options: NodeRunLoopOptions = {}) {
    this.keepAlive = options.keepAlive ?? true;
    this.logger = options.logger ?? new ConsoleLogger();
  }

  now(): number {
    return Date.now();
  }

  addTimer(timer: SchedulableTimer, mode: RunLoopMode): void {
    if (!timer.isValid) {
      this.logger.debug("Ignoring invalid timer", { id: timer.id, mode });
      return;
    }

    const existing = this.registrations.get(timer);
    if (existing) {
      existing.modes.add(mode);
      return;
    }

    const registration: Registration = { timer, modes: new Set([mode]), timeout: null };
    this.registrations.set(timer, registration);
    this.logger.debug("Timer attached", { id: timer.id, mode, fireDate: timer.fireDate });
    this.arm(registration);
  }

  removeTimer(timer: SchedulableTimer, mode: RunLoopMode): void {
    const registration = this.registrations.get(timer);
    if (!registration) return;
    registration.modes.delete(mode);
    if (registration.modes.size > 0) return;
    this.release(registration);
    this.logger.debug("Timer detached", { id: timer.id, mode });
  }

  containsTimer(timer: SchedulableTimer, mode: RunLoopMode): boolean {
    return this.registrations.get(timer)?.modes.has(mode) ?? false;
  }

  pendingCount(): number {
    return this.registrations.size;
  }

  /**
   * Detaches every timer without invalidating it.
   */
  shutdown(): void {
    for (const registration of Array.from(this.registrations.values())) {
      this.release(registration);
    }
  }

  private arm(registration: Registration) {
    const remaining = Math.max(0, registration.timer.fireDate - this.now());
    registration.timeout = setTimeout(() => this.tick(registration), Math.min(remaining, MAX_TIMEOUT_MS));
    if (!this.keepAlive && typeof registration.timeout.unref === "function") {
      registration.timeout.unref();
    }
  }

  private tick(registration: Registration) {
    registration.timeout = null;
    const { timer } = registration;
    if (this.registrations.get(timer) !== registration) return;

    if (!timer.isValid) {
      this.release(registration);
      return;
    }

    const now = this.now();
    if (timer.fireDate > now) {
      this.arm(registration);
      return;
    }

    try {
      timer.fire(now);
    } catch (err) {
      this.logger.error("Timer callback failed", {
        id: timer.id,
        error: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
      });
    }

    // stopped from inside its own callback
    if (this.registrations.get(timer) !== registration) return;

    if (timer.isValid) {
      this.arm(registration);
    } else {
      this.release(registration);
    }
  }

  private release(registration: Registration) {
    if (registration.timeout) {
      clearTimeout(registration.timeout);
      registration.timeout = null;
    }
    this.registrations.delete(registration.timer);
  }
}
