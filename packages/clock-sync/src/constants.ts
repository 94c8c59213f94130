/**
 * Constants for @clockwork/clock-sync.
 */

export const PACKAGE_NAME = "@clockwork/clock-sync";

export const DEFAULT_SERVER_ADDRESS = "time.google.com";
export const DEFAULT_UPDATE_INTERVAL_SECONDS = 7_200; // 2 hours
export const DEFAULT_RETRY_MIN_SECONDS = 1;
export const DEFAULT_RETRY_MAX_SECONDS = 30;
export const DEFAULT_REQUEST_TIMEOUT_MS = 5_000;

/** Bounds of the uniform jitter applied to every scheduled delay */
export const JITTER_LOW = 0.9;
export const JITTER_HIGH = 1.1;

export const LOG_TAG = "ClockSync";

// ---------------------------------------------------------------------------
// SNTP wire constants
// ---------------------------------------------------------------------------

export const SNTP_PORT = 123;
export const SNTP_PACKET_SIZE = 48;
/** Seconds from 1900-01-01 (NTP era 0) to 1970-01-01 */
export const NTP_UNIX_EPOCH_DELTA = 2_208_988_800;
/** LI = 0, VN = 4, Mode = 3 (client) */
export const SNTP_REQUEST_HEADER = 0x23;
export const SNTP_MODE_SERVER = 4;
export const SNTP_MODE_BROADCAST = 5;
export const SNTP_LEAP_UNSYNCHRONIZED = 3;
export const SNTP_MAX_STRATUM = 15;
export const SNTP_TRANSMIT_OFFSET = 40;

// ---------------------------------------------------------------------------
// Link monitor
// ---------------------------------------------------------------------------

export const DEFAULT_LINK_POLL_INTERVAL_MS = 5_000;
