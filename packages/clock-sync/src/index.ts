export { applyJitter, SyncBackoff } from "./backoff.js";
export { defaultClock } from "./clock.js";
export { createConfigReader, resolveClockSyncConfig } from "./config.js";
export {
  DEFAULT_LINK_POLL_INTERVAL_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY_MAX_SECONDS,
  DEFAULT_RETRY_MIN_SECONDS,
  DEFAULT_SERVER_ADDRESS,
  DEFAULT_UPDATE_INTERVAL_SECONDS,
  PACKAGE_NAME,
  SNTP_PORT,
} from "./constants.js";
export {
  DeferredWorkQueue,
  type DeferredWorkHandle,
  type DeferredWorkQueueOptions,
  shiftDeadlinesObserver,
} from "./deferred-work.js";
export { type InitClockSyncOptions, type InitClockSyncResult, initClockSync } from "./init.js";
export {
  type InterfaceReader,
  type IpAcquired,
  type LinkMonitorEvents,
  NetworkLinkMonitor,
  type NetworkLinkMonitorOptions,
} from "./link-monitor.js";
export { createConsoleLogger } from "./logger.js";
export { TimeChangeRegistry, type TimeChangeRegistryOptions } from "./observers.js";
export { OffsetClock } from "./offset-clock.js";
export { ClockSyncScheduler, type ClockSyncSchedulerOptions } from "./scheduler.js";
export {
  decodeSntpReply,
  encodeSntpRequest,
  ntpToUnixSeconds,
  type SntpDecodeResult,
  type SntpReply,
} from "./sntp/codec.js";
export {
  parseServerAddress,
  type ServerEndpoint,
  type UdpSocketFactory,
  type UdpSocketLike,
  UdpSyncClient,
  type UdpSyncClientOptions,
} from "./sntp/udp-client.js";
export {
  type Clock,
  type ClockSetter,
  type ClockSyncConfig,
  ClockSyncConfigSchema,
  type ClockSyncConfigSource,
  type ClockSyncEvents,
  type ClockSyncLogger,
  type ClockSyncStatus,
  type LinkEventSource,
  type ResolvedClockSyncConfig,
  type ScheduleRegime,
  type ScheduledAttempt,
  type SyncClient,
  type SyncClientEvent,
  type SyncClientEventKind,
  type SyncEventHandler,
  type SyncSession,
  type SyncSuccess,
  type TimeChangeCallback,
  type TimerHandle,
} from "./types.js";
