/**
 * @clockwork/errors
 *
 * Shared error taxonomy for the Clockwork time synchronization packages.
 *
 * Every error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `error.code === "XXX"` for fine-grained matching,
 * or `instanceof ClockSyncError` to catch the whole family.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { ClockworkError, type ErrorJSON } from "./base.js";

export {
  type BaseErrorType,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export type { ValidationIssue } from "./types.js";

// ============================================================================
// CLOCK SYNC ERRORS
// ============================================================================

export {
  ClockSetFailedError,
  ClockSyncConfigurationError,
  ClockSyncError,
  ClockSyncMalformedReplyError,
  ClockSyncTransportError,
  TimeChangeObserverError,
} from "./clock-sync.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@clockwork/errors";
export const PACKAGE_VERSION = "0.1.0";
