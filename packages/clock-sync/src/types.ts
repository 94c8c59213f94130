import { z } from "zod";
import {
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY_MAX_SECONDS,
  DEFAULT_RETRY_MIN_SECONDS,
  DEFAULT_SERVER_ADDRESS,
  DEFAULT_UPDATE_INTERVAL_SECONDS,
} from "./constants.js";

// ---------------------------------------------------------------------------
// Clock
// ---------------------------------------------------------------------------

/**
 * Clock abstraction, injectable for deterministic testing.
 *
 * `setTimeout` doubles as the one-shot deferred timer the scheduler arms
 * between attempts.
 */
export interface Clock {
  readonly now: () => number;
  readonly setTimeout: (fn: () => void, ms: number) => ReturnType<typeof globalThis.setTimeout>;
  readonly clearTimeout: (id: ReturnType<typeof globalThis.setTimeout>) => void;
}

export type TimerHandle = ReturnType<typeof globalThis.setTimeout>;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface ClockSyncConfig {
  readonly enabled?: boolean;
  readonly serverAddress?: string;
  readonly updateIntervalSeconds?: number;
  readonly retryMinSeconds?: number;
  readonly retryMaxSeconds?: number;
  readonly requestTimeoutMs?: number;
}

export const ClockSyncConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    serverAddress: z.string().trim().default(DEFAULT_SERVER_ADDRESS),
    updateIntervalSeconds: z.number().int().positive().default(DEFAULT_UPDATE_INTERVAL_SECONDS),
    retryMinSeconds: z.number().int().positive().default(DEFAULT_RETRY_MIN_SECONDS),
    retryMaxSeconds: z.number().int().positive().default(DEFAULT_RETRY_MAX_SECONDS),
    requestTimeoutMs: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  })
  .refine((config) => config.retryMinSeconds <= config.retryMaxSeconds, {
    message: "retryMinSeconds must not exceed retryMaxSeconds",
    path: ["retryMinSeconds"],
  });

/**
 * Config after Zod parsing, with every default applied.
 */
export type ResolvedClockSyncConfig = Readonly<z.infer<typeof ClockSyncConfigSchema>>;

/**
 * Static config, or a provider that is called again before every attempt so
 * the server address, enable flag and backoff bounds can change at runtime.
 */
export type ClockSyncConfigSource = ClockSyncConfig | (() => ClockSyncConfig);

// ---------------------------------------------------------------------------
// Sync client (transport + protocol)
// ---------------------------------------------------------------------------

/**
 * Opaque handle to one connect → request → reply → close cycle.
 */
export interface SyncSession {
  readonly id: number;
  readonly server: string;
}

export type SyncClientEvent =
  | { readonly kind: "connected" }
  | { readonly kind: "reply"; readonly serverTime: number }
  | { readonly kind: "malformed-reply"; readonly reason: string }
  | { readonly kind: "transport-failure"; readonly error: Error }
  | { readonly kind: "closed" };

export type SyncClientEventKind = SyncClientEvent["kind"];

export type SyncEventHandler = (event: SyncClientEvent, session: SyncSession) => void;

/**
 * Time server client. Every session delivers at most one outcome
 * (`reply`, `malformed-reply` or `transport-failure`) followed by exactly one
 * `closed`. No event is delivered from inside `connect` itself.
 */
export interface SyncClient {
  connect(serverAddress: string, onEvent: SyncEventHandler): SyncSession | null;
  sendRequest(session: SyncSession): void;
  forceClose(session: SyncSession): void;
}

// ---------------------------------------------------------------------------
// Other collaborators
// ---------------------------------------------------------------------------

/**
 * Applies an absolute time (seconds since the Unix epoch, fractional) to the
 * clock. Returns false when the time was refused.
 */
export interface ClockSetter {
  setTime(absoluteSeconds: number): boolean;
}

/**
 * Source of "network became reachable" notifications.
 * Returns an unsubscribe function.
 */
export interface LinkEventSource {
  onIpAcquired(handler: () => void): () => void;
}

export interface ClockSyncLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

// ---------------------------------------------------------------------------
// Time change observers
// ---------------------------------------------------------------------------

/**
 * Invoked with the signed clock step in seconds whenever the clock is set
 * from a server reply.
 */
export type TimeChangeCallback<C = unknown> = (context: C, deltaSeconds: number) => void;

// ---------------------------------------------------------------------------
// Status + events
// ---------------------------------------------------------------------------

export type ScheduleRegime = "steady" | "backoff";

export interface ClockSyncStatus {
  readonly running: boolean;
  readonly enabled: boolean;
  readonly synced: boolean;
  readonly currentBackoffMs: number;
  readonly sessionActive: boolean;
  readonly timerArmed: boolean;
  readonly nextAttemptAt: number | undefined;
  readonly lastSyncAt: number | undefined;
  readonly lastDeltaSeconds: number | undefined;
  readonly attempts: number;
  readonly failures: number;
}

export interface SyncSuccess {
  readonly server: string;
  readonly serverTime: number;
  readonly deltaSeconds: number;
}

export interface ScheduledAttempt {
  readonly delayMs: number;
  readonly regime: ScheduleRegime;
}

/** Events emitted by ClockSyncScheduler. */
export interface ClockSyncEvents {
  sync: [SyncSuccess];
  scheduled: [ScheduledAttempt];
  error: [Error];
}
