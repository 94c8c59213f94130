import { ClockSyncConfigurationError } from "@clockwork/errors";
import { defaultClock } from "./clock.js";
import { resolveClockSyncConfig } from "./config.js";
import { DeferredWorkQueue, shiftDeadlinesObserver } from "./deferred-work.js";
import { NetworkLinkMonitor } from "./link-monitor.js";
import { createConsoleLogger } from "./logger.js";
import { OffsetClock } from "./offset-clock.js";
import { ClockSyncScheduler } from "./scheduler.js";
import { UdpSyncClient } from "./sntp/udp-client.js";
import type {
  Clock,
  ClockSetter,
  ClockSyncConfigSource,
  ClockSyncLogger,
  LinkEventSource,
  ResolvedClockSyncConfig,
  SyncClient,
} from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface InitClockSyncOptions {
  readonly config?: ClockSyncConfigSource;
  /** Defaults to a {@link UdpSyncClient} */
  readonly client?: SyncClient;
  /**
   * Defaults to an {@link OffsetClock} over `clock`, which then also serves
   * as the scheduler's clock. A supplied setter must step `clock`.
   */
  readonly clockSetter?: ClockSetter;
  readonly clock?: Clock;
  readonly random?: () => number;
  readonly logger?: ClockSyncLogger;
  /** Defaults to a {@link NetworkLinkMonitor} started alongside the scheduler */
  readonly linkSource?: LinkEventSource;
  /** Failures thrown by deferred work; logged when absent */
  readonly onWorkError?: (error: Error) => void;
}

export type InitClockSyncResult =
  | {
      readonly code: "ok";
      /** Absent when the feature is disabled */
      readonly scheduler?: ClockSyncScheduler;
      /** The clock being synced; read this rather than the base clock */
      readonly clock: Clock;
      /** Deferred work on `clock`, with deadlines shifted by every clock step */
      readonly workQueue: DeferredWorkQueue;
      /** Stops the scheduler and anything init started for it */
      readonly shutdown: () => void;
    }
  | { readonly code: "config-error"; readonly error: ClockSyncConfigurationError };

// ---------------------------------------------------------------------------
// initClockSync
// ---------------------------------------------------------------------------

/**
 * Validate the config, wire default collaborators and start syncing.
 *
 * A disabled config starts nothing and hands back a work queue on the
 * unsynced clock. An invalid one, including an enabled config with no server,
 * is reported as `config-error` with nothing armed or started.
 */
export function initClockSync(options: InitClockSyncOptions = {}): InitClockSyncResult {
  const logger = options.logger ?? createConsoleLogger();
  const source = options.config ?? {};

  let initial: ResolvedClockSyncConfig;
  try {
    initial = resolveClockSyncConfig(typeof source === "function" ? source() : source);
  } catch (err) {
    if (err instanceof ClockSyncConfigurationError) {
      logger.error(err.message);
      return { code: "config-error", error: err };
    }
    throw err;
  }

  const baseClock = options.clock ?? defaultClock;
  const onWorkError =
    options.onWorkError ??
    ((error: Error) => logger.warn(`Deferred work failed: ${error.message}`));

  if (!initial.enabled) {
    logger.info("Disabled");
    const workQueue = new DeferredWorkQueue({ clock: baseClock, onError: onWorkError });
    return { code: "ok", clock: baseClock, workQueue, shutdown: () => workQueue.clear() };
  }

  let clock = baseClock;
  let clockSetter = options.clockSetter;
  if (!clockSetter) {
    const offsetClock = new OffsetClock(baseClock);
    clock = offsetClock;
    clockSetter = offsetClock;
  }
  const workQueue = new DeferredWorkQueue({ clock, onError: onWorkError });

  const client =
    options.client ?? new UdpSyncClient({ clock, requestTimeoutMs: initial.requestTimeoutMs });

  let monitor: NetworkLinkMonitor | undefined;
  let linkSource = options.linkSource;
  if (!linkSource) {
    monitor = new NetworkLinkMonitor({ clock });
    linkSource = monitor;
  }

  const scheduler = new ClockSyncScheduler({
    config: source,
    client,
    clockSetter,
    clock,
    logger,
    linkSource,
    random: options.random,
  });

  scheduler.registerTimeChangeObserver(shiftDeadlinesObserver, workQueue);

  scheduler.start();
  monitor?.start();

  return {
    code: "ok",
    scheduler,
    clock,
    workQueue,
    shutdown: () => {
      monitor?.stop();
      scheduler.stop();
      workQueue.clear();
    },
  };
}
