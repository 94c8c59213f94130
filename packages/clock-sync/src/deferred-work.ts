import { defaultClock } from "./clock.js";
import type { Clock, TimeChangeCallback, TimerHandle } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DeferredWorkHandle = number;

interface PendingWork {
  readonly id: DeferredWorkHandle;
  deadline: number;
  readonly fn: () => void;
}

export interface DeferredWorkQueueOptions {
  /** Clock whose `now()` the deadlines are measured against */
  readonly clock?: Clock;
  /** Called when a callback throws; the remaining due callbacks still run */
  readonly onError?: (error: Error) => void;
}

/**
 * Registry callback that shifts the queue passed as context.
 */
export const shiftDeadlinesObserver: TimeChangeCallback<DeferredWorkQueue> = (queue, deltaSeconds) =>
  queue.shiftDeadlines(deltaSeconds);

// ---------------------------------------------------------------------------
// DeferredWorkQueue
// ---------------------------------------------------------------------------

/**
 * Callbacks keyed by absolute deadline (ms on the queue's clock), driven by a
 * single timer armed for the earliest one.
 *
 * When the clock is stepped, `shiftDeadlines(delta)` moves every deadline by
 * the same amount so pending work keeps its remaining wait instead of firing
 * early (forward step) or stalling (backward step).
 */
export class DeferredWorkQueue {
  private readonly clock: Clock;
  private readonly onError: ((error: Error) => void) | undefined;
  private pending: PendingWork[] = [];
  private timer: TimerHandle | undefined;
  private nextId = 1;

  constructor(options: DeferredWorkQueueOptions = {}) {
    this.clock = options.clock ?? defaultClock;
    this.onError = options.onError;
  }

  schedule(atMs: number, fn: () => void): DeferredWorkHandle {
    const id = this.nextId++;
    this.pending = [...this.pending, { id, deadline: atMs, fn }];
    this.rearm();
    return id;
  }

  /**
   * Drop a pending callback. Returns false if it already ran or was never
   * scheduled.
   */
  cancel(handle: DeferredWorkHandle): boolean {
    const before = this.pending.length;
    this.pending = this.pending.filter((work) => work.id !== handle);
    if (this.pending.length === before) return false;
    this.rearm();
    return true;
  }

  shiftDeadlines(deltaSeconds: number): void {
    const deltaMs = deltaSeconds * 1000;
    for (const work of this.pending) {
      work.deadline += deltaMs;
    }
    this.rearm();
  }

  /**
   * Callback for `registerTimeChangeObserver`, bound to this queue.
   */
  asTimeChangeObserver(): TimeChangeCallback {
    return (_context, deltaSeconds) => this.shiftDeadlines(deltaSeconds);
  }

  /** Pending deadlines, earliest first */
  get deadlines(): readonly number[] {
    return this.ordered().map((work) => work.deadline);
  }

  get size(): number {
    return this.pending.length;
  }

  /** Disarm the timer and drop every pending callback */
  clear(): void {
    this.pending = [];
    this.disarm();
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private ordered(): PendingWork[] {
    // Array.prototype.sort is stable, so equal deadlines keep insertion order
    return [...this.pending].sort((a, b) => a.deadline - b.deadline);
  }

  private disarm(): void {
    if (this.timer !== undefined) {
      this.clock.clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private rearm(): void {
    this.disarm();
    const earliest = this.ordered()[0];
    if (!earliest) return;
    const delay = Math.max(0, earliest.deadline - this.clock.now());
    this.timer = this.clock.setTimeout(() => this.runDue(), delay);
  }

  private runDue(): void {
    this.timer = undefined;
    const now = this.clock.now();
    const due = this.ordered().filter((work) => work.deadline <= now);
    const dueIds = new Set(due.map((work) => work.id));
    this.pending = this.pending.filter((work) => !dueIds.has(work.id));

    for (const work of due) {
      try {
        work.fn();
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        if (this.onError) {
          this.onError(error);
        } else {
          console.warn(`[ClockSync] Deferred work failed: ${error.message}`);
        }
      }
    }

    if (this.timer === undefined) this.rearm();
  }
}
