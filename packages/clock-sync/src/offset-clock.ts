import { defaultClock } from "./clock.js";
import type { Clock, ClockSetter, TimerHandle } from "./types.js";

/**
 * Wall clock corrected by the last time applied through {@link setTime}.
 *
 * Node has no portable way to set the system clock, so the synced time lives
 * in-process: `now()` is the base clock plus a stored offset. Timers are
 * relative and pass straight through to the base clock.
 */
export class OffsetClock implements Clock, ClockSetter {
  private offsetMs = 0;
  private readonly base: Clock;

  constructor(base: Clock = defaultClock) {
    this.base = base;
  }

  readonly now = (): number => this.base.now() + this.offsetMs;

  readonly setTimeout = (fn: () => void, ms: number): TimerHandle => this.base.setTimeout(fn, ms);

  readonly clearTimeout = (id: TimerHandle): void => {
    this.base.clearTimeout(id);
  };

  /**
   * Step the clock to `absoluteSeconds` since the Unix epoch.
   * Refuses non-finite and non-positive times.
   */
  setTime(absoluteSeconds: number): boolean {
    if (!Number.isFinite(absoluteSeconds) || absoluteSeconds <= 0) return false;
    this.offsetMs = absoluteSeconds * 1000 - this.base.now();
    return true;
  }

  /** Current correction applied on top of the base clock */
  get offset(): number {
    return this.offsetMs;
  }
}
