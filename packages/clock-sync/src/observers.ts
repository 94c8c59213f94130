import { TimeChangeObserverError } from "@clockwork/errors";
import type { TimeChangeCallback } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A registered callback with its context already bound */
type BoundObserver = (deltaSeconds: number) => void;

export interface TimeChangeRegistryOptions {
  /** Called when an observer throws; the remaining observers still run */
  readonly onObserverError?: (error: TimeChangeObserverError) => void;
}

// ---------------------------------------------------------------------------
// TimeChangeRegistry
// ---------------------------------------------------------------------------

/**
 * List of clock-step observers, newest at the head.
 *
 * Observers run synchronously, most recently registered first, each exactly
 * once per clock step. There is no removal: observers live as long as the
 * registry.
 */
export class TimeChangeRegistry {
  // Immutable array, replaced on register
  private observers: readonly BoundObserver[] = [];
  private readonly onObserverError: ((error: TimeChangeObserverError) => void) | undefined;

  constructor(options: TimeChangeRegistryOptions = {}) {
    this.onObserverError = options.onObserverError;
  }

  /**
   * Register `callback`, to be called as `callback(context, delta)` ahead of
   * every observer registered before it.
   */
  register<C>(callback: TimeChangeCallback<C>, context: C): void {
    const bound: BoundObserver = (deltaSeconds) => callback(context, deltaSeconds);
    this.observers = [bound, ...this.observers];
  }

  /**
   * Invoke every observer with the clock step, newest first. The list is
   * snapshotted first, so observers registered during notification wait for
   * the next step. A failure's `observerIndex` is its position in that order.
   *
   * @returns the number of observers that completed without throwing
   */
  notifyAll(deltaSeconds: number): number {
    const snapshot = this.observers;
    let completed = 0;

    snapshot.forEach((observer, index) => {
      try {
        observer(deltaSeconds);
        completed += 1;
      } catch (err) {
        const cause = err instanceof Error ? err : new Error(String(err));
        const error = new TimeChangeObserverError(index, cause);
        if (this.onObserverError) {
          this.onObserverError(error);
        } else {
          console.warn(`[ClockSync] ${error.message}`);
        }
      }
    });

    return completed;
  }

  get size(): number {
    return this.observers.length;
  }
}
