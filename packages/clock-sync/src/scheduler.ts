/**
 * Clock sync retry scheduler.
 *
 * Decides when a sync attempt is made, escalates the retry delay on failure,
 * returns to the steady update interval after a success and broadcasts every
 * clock step to the registered time change observers.
 *
 * All state is per instance and driven by callbacks on one event loop:
 * client events, the deferred timer and link-up notifications.
 */

import { EventEmitter } from "node:events";
import {
  ClockSetFailedError,
  ClockSyncMalformedReplyError,
  ClockSyncTransportError,
  type TimeChangeObserverError,
} from "@clockwork/errors";
import {
  getClockStep,
  getSyncAttempts,
  getSyncOutcomes,
  type SpanHandle,
  startSpan,
} from "@clockwork/telemetry";
import { applyJitter, SyncBackoff } from "./backoff.js";
import { defaultClock } from "./clock.js";
import { createConfigReader } from "./config.js";
import { createConsoleLogger } from "./logger.js";
import { TimeChangeRegistry } from "./observers.js";
import type {
  Clock,
  ClockSetter,
  ClockSyncConfigSource,
  ClockSyncEvents,
  ClockSyncLogger,
  ClockSyncStatus,
  LinkEventSource,
  ResolvedClockSyncConfig,
  ScheduleRegime,
  SyncClient,
  SyncClientEvent,
  SyncSession,
  TimeChangeCallback,
  TimerHandle,
} from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type FailureOutcome = "malformed" | "transport" | "clock-set";

export interface ClockSyncSchedulerOptions {
  /** Static config or a provider re-read before every attempt */
  readonly config?: ClockSyncConfigSource;
  readonly client: SyncClient;
  readonly clockSetter: ClockSetter;
  /** Local time source and deferred timer. Should read the clock being set. */
  readonly clock?: Clock;
  /** Uniform [0, 1) source for jitter */
  readonly random?: () => number;
  readonly logger?: ClockSyncLogger;
  /** Link-up notifications, subscribed on start() */
  readonly linkSource?: LinkEventSource;
  readonly onObserverError?: (error: TimeChangeObserverError) => void;
}

// ---------------------------------------------------------------------------
// ClockSyncScheduler
// ---------------------------------------------------------------------------

/**
 * Single-server SNTP sync scheduler.
 *
 * At most one session is active and at most one timer is armed at any time.
 * Runtime failures never escape: they are logged, emitted as `'error'` when a
 * listener is present, and retried through the backoff path.
 */
export class ClockSyncScheduler extends EventEmitter<ClockSyncEvents> {
  private readonly readConfig: () => ResolvedClockSyncConfig;
  private readonly client: SyncClient;
  private readonly clockSetter: ClockSetter;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly logger: ClockSyncLogger;
  private readonly linkSource: LinkEventSource | undefined;
  private readonly registry: TimeChangeRegistry;
  private readonly backoff = new SyncBackoff();

  private config: ResolvedClockSyncConfig;
  private activeSession: SyncSession | undefined;
  private sessionSpan: SpanHandle | undefined;
  private sessionError: Error | undefined;
  // Set when a new attempt asked the active session to close
  private sessionSuperseded = false;
  private timer: TimerHandle | undefined;
  private unsubscribeLink: (() => void) | undefined;
  private running = false;
  private _synced = false;

  // Diagnostics
  private attempts = 0;
  private failures = 0;
  private nextAttemptAt: number | undefined;
  private lastSyncAt: number | undefined;
  private lastDeltaSeconds: number | undefined;

  /**
   * @throws {ClockSyncConfigurationError} when the initial config is invalid
   */
  constructor(options: ClockSyncSchedulerOptions) {
    super();
    this.readConfig = createConfigReader(options.config ?? {});
    this.config = this.readConfig();
    this.client = options.client;
    this.clockSetter = options.clockSetter;
    this.clock = options.clock ?? defaultClock;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createConsoleLogger();
    this.linkSource = options.linkSource;
    this.registry = new TimeChangeRegistry({
      onObserverError:
        options.onObserverError ??
        ((error) => {
          this.logger.warn(error.message);
          this.emitError(error);
        }),
    });
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Subscribe to link-up events and arm the first attempt.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    if (this.linkSource) {
      this.unsubscribeLink = this.linkSource.onIpAcquired(() => this.handleLinkUp());
    }
    this.logger.info(`Started, server ${this.config.serverAddress}`);
    this.scheduleNext();
  }

  /**
   * Disarm the timer, drop any active session and unsubscribe. Events still
   * in flight for the dropped session are ignored.
   */
  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.unsubscribeLink?.();
    this.unsubscribeLink = undefined;
    this.disarm();

    const session = this.activeSession;
    if (session) {
      this.activeSession = undefined;
      this.sessionSpan?.end(new Error("scheduler stopped"));
      this.sessionSpan = undefined;
      this.client.forceClose(session);
    }
    this.logger.info("Stopped");
  }

  // -------------------------------------------------------------------------
  // Scheduling
  // -------------------------------------------------------------------------

  /**
   * Start a session unless one is already active. An active session gets a
   * best-effort close request instead, and the failure that close reports is
   * not counted.
   *
   * @returns true if a new session was started
   */
  attemptSync(): boolean {
    this.refreshConfig();

    if (this.activeSession) {
      this.logger.debug(`Sync with ${this.activeSession.server} still active, closing it`);
      this.sessionSuperseded = true;
      this.client.forceClose(this.activeSession);
      return false;
    }
    if (!this.config.enabled) {
      return false;
    }

    const server = this.config.serverAddress;
    const session = this.client.connect(server, (event, s) => this.handleClientEvent(event, s));
    if (!session) {
      const error = new ClockSyncTransportError(server, "could not open a connection");
      this.failures += 1;
      this.logger.warn(error.message);
      getSyncOutcomes().add(1, { outcome: "transport" });
      this.emitError(error);
      return false;
    }

    this.activeSession = session;
    this.sessionError = undefined;
    this.sessionSuperseded = false;
    this.sessionSpan = startSpan("clocksync.session", {
      "clocksync.server": server,
      "clocksync.session.id": session.id,
    });
    this.attempts += 1;
    getSyncAttempts().add(1);
    this.logger.debug(`Syncing with ${server}`);
    return true;
  }

  /**
   * Arm the deferred timer if the feature is enabled and none is armed.
   *
   * Before the first success the delay is the doubled, clamped backoff; after
   * it, the update interval. Either is jittered.
   *
   * @returns the armed delay in ms, or undefined if nothing was armed
   */
  scheduleNext(): number | undefined {
    this.refreshConfig();
    if (!this.config.enabled || this.timer !== undefined) {
      return undefined;
    }

    const regime: ScheduleRegime = this._synced ? "steady" : "backoff";
    const baseMs = this._synced
      ? this.config.updateIntervalSeconds * 1000
      : this.backoff.next(this.config.retryMinSeconds * 1000, this.config.retryMaxSeconds * 1000);
    const delayMs = applyJitter(baseMs, this.random);

    this.nextAttemptAt = this.clock.now() + delayMs;
    this.timer = this.clock.setTimeout(() => this.handleTimer(), delayMs);
    this.logger.debug(`Next sync attempt in ${delayMs}ms (${regime})`);
    this.emit("scheduled", { delayMs, regime });
    return delayMs;
  }

  /**
   * Network became reachable: try now, and make sure a retry is armed.
   */
  handleLinkUp(): void {
    this.refreshConfig();
    if (!this.config.enabled) return;
    this.attemptSync();
    this.scheduleNext();
  }

  // -------------------------------------------------------------------------
  // Observers
  // -------------------------------------------------------------------------

  /**
   * Register `callback(context, deltaSeconds)` to run after every clock step.
   * The most recently registered observer runs first. Observers are never
   * removed.
   */
  registerTimeChangeObserver<C>(callback: TimeChangeCallback<C>, context: C): void {
    this.registry.register(callback, context);
  }

  // -------------------------------------------------------------------------
  // State
  // -------------------------------------------------------------------------

  /** Whether at least one sync has succeeded. */
  get synced(): boolean {
    return this._synced;
  }

  /** Last computed failure backoff; 0 before any failure and after a success. */
  get currentBackoffMs(): number {
    return this.backoff.currentMs;
  }

  get isRunning(): boolean {
    return this.running;
  }

  status(): ClockSyncStatus {
    return {
      running: this.running,
      enabled: this.config.enabled,
      synced: this._synced,
      currentBackoffMs: this.backoff.currentMs,
      sessionActive: this.activeSession !== undefined,
      timerArmed: this.timer !== undefined,
      nextAttemptAt: this.nextAttemptAt,
      lastSyncAt: this.lastSyncAt,
      lastDeltaSeconds: this.lastDeltaSeconds,
      attempts: this.attempts,
      failures: this.failures,
    };
  }

  // -------------------------------------------------------------------------
  // Client events
  // -------------------------------------------------------------------------

  private handleClientEvent(event: SyncClientEvent, session: SyncSession): void {
    if (this.activeSession?.id !== session.id) {
      this.logger.debug(`Ignoring ${event.kind} from stale session #${session.id}`);
      return;
    }

    switch (event.kind) {
      case "connected":
        this.client.sendRequest(session);
        return;
      case "reply":
        this.handleReply(session, event.serverTime);
        return;
      case "malformed-reply":
        this.handleFailure(session, new ClockSyncMalformedReplyError(event.reason), "malformed");
        return;
      case "transport-failure":
        if (this.sessionSuperseded) {
          this.logger.debug(`Session #${session.id} closed for a newer attempt`);
          return;
        }
        this.handleFailure(session, event.error, "transport");
        return;
      case "closed":
        this.handleClosed();
        return;
    }
  }

  private handleReply(session: SyncSession, serverTime: number): void {
    const localTime = this.clock.now() / 1000;

    let applied: boolean;
    let cause: Error | undefined;
    try {
      applied = this.clockSetter.setTime(serverTime);
    } catch (err) {
      applied = false;
      cause = err instanceof Error ? err : new Error(String(err));
    }

    if (!applied) {
      this.handleFailure(session, new ClockSetFailedError(serverTime, cause), "clock-set");
      return;
    }

    const deltaSeconds = serverTime - localTime;
    this.logger.info(
      `Time set to ${serverTime.toFixed(3)} from ${session.server} (step ${deltaSeconds.toFixed(3)}s)`,
    );
    this.registry.notifyAll(deltaSeconds);

    this._synced = true;
    this.backoff.reset();
    this.disarm();
    this.lastSyncAt = this.clock.now();
    this.lastDeltaSeconds = deltaSeconds;

    getSyncOutcomes().add(1, { outcome: "success" });
    getClockStep().record(Math.abs(deltaSeconds));
    this.sessionSpan?.setAttributes({
      "clocksync.server_time": serverTime,
      "clocksync.delta_seconds": deltaSeconds,
    });

    this.client.forceClose(session);
    this.scheduleNext();
    this.emit("sync", { server: session.server, serverTime, deltaSeconds });
  }

  private handleFailure(session: SyncSession, error: Error, outcome: FailureOutcome): void {
    this.failures += 1;
    this.sessionError = error;
    if (outcome === "clock-set") {
      this.logger.error(error.message);
    } else {
      this.logger.warn(error.message);
    }
    getSyncOutcomes().add(1, { outcome });
    this.emitError(error);
    this.client.forceClose(session);
  }

  private handleClosed(): void {
    this.activeSession = undefined;
    this.sessionSpan?.end(this.sessionError);
    this.sessionSpan = undefined;
    this.sessionError = undefined;
    this.sessionSuperseded = false;
    this.scheduleNext();
  }

  // -------------------------------------------------------------------------
  // Timer + config
  // -------------------------------------------------------------------------

  private handleTimer(): void {
    this.timer = undefined;
    this.nextAttemptAt = undefined;
    this.attemptSync();
    // Safety net in case the session never reports back; a success re-arms it
    this.scheduleNext();
  }

  private disarm(): void {
    if (this.timer !== undefined) {
      this.clock.clearTimeout(this.timer);
      this.timer = undefined;
      this.nextAttemptAt = undefined;
    }
  }

  private refreshConfig(): void {
    try {
      this.config = this.readConfig();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.warn(`Config reload failed, keeping previous config: ${error.message}`);
      this.emitError(error);
    }
  }

  private emitError(error: Error): void {
    if (this.listenerCount("error") > 0) {
      this.emit("error", error);
    }
  }
}
