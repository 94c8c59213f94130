import { JITTER_HIGH, JITTER_LOW } from "./constants.js";

// ---------------------------------------------------------------------------
// Jitter
// ---------------------------------------------------------------------------

/**
 * Spread a delay uniformly over [0.9 × ms, 1.1 × ms] and truncate to whole
 * milliseconds, so devices that lost the server together do not come back in
 * lockstep.
 */
export function applyJitter(ms: number, random: () => number = Math.random): number {
  const low = ms * JITTER_LOW;
  const high = ms * JITTER_HIGH;
  return Math.trunc(low + random() * (high - low));
}

// ---------------------------------------------------------------------------
// SyncBackoff
// ---------------------------------------------------------------------------

/**
 * Doubling retry delay for failed sync attempts.
 *
 *   next = max(minMs, min(maxMs, current × 2))
 *
 * Starts at 0, so the first failure yields `minMs`. The value only grows (or
 * stays clamped at `maxMs`) until {@link reset} is called after a success.
 */
export class SyncBackoff {
  private current = 0;
  private consecutiveFailures = 0;

  /**
   * Compute the next backoff from the current bounds and remember it.
   */
  next(minMs: number, maxMs: number): number {
    const doubled = Math.min(maxMs, this.current * 2);
    this.current = Math.max(minMs, doubled);
    this.consecutiveFailures += 1;
    return this.current;
  }

  /**
   * Forget all failures (call on successful sync).
   */
  reset(): void {
    this.current = 0;
    this.consecutiveFailures = 0;
  }

  /**
   * Last computed backoff in milliseconds; 0 when none since the last reset.
   */
  get currentMs(): number {
    return this.current;
  }

  /**
   * Number of backoff delays computed since the last reset.
   */
  get failures(): number {
    return this.consecutiveFailures;
  }
}
