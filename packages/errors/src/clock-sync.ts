import { ClockworkError } from "./base.js";
import {
  ERROR_CATALOG,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";
import type { ValidationIssue } from "./types.js";

// ---------------------------------------------------------------------------
// Base class for all clock sync errors
// ---------------------------------------------------------------------------

/**
 * Abstract base class for clock sync errors.
 *
 * Enables generic catch: `if (e instanceof ClockSyncError)`
 * while specific subclasses allow precise handling.
 */
export abstract class ClockSyncError extends ClockworkError {}

// ---------------------------------------------------------------------------
// Configuration invalid
// ---------------------------------------------------------------------------

/**
 * Thrown (or returned from init) when the clock sync configuration is invalid,
 * including an enabled feature with no server address.
 */
export class ClockSyncConfigurationError extends ClockSyncError {
  readonly _tag = "ValidationError" as const;
  readonly code = "CLOCK_SYNC_CONFIGURATION_INVALID" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(`Invalid clock sync configuration: ${message}`);
    const entry = ERROR_CATALOG.CLOCK_SYNC_CONFIGURATION_INVALID;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Transport failed
// ---------------------------------------------------------------------------

/**
 * A request to the time server could not be sent, or no reply came back
 * before the request timeout.
 */
export class ClockSyncTransportError extends ClockSyncError {
  readonly _tag = "ExternalError" as const;
  readonly code = "CLOCK_SYNC_TRANSPORT_FAILED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly server: string;

  constructor(server: string, reason: string, cause?: Error) {
    super(
      `Time server ${server} unreachable: ${reason}`,
      { server },
      undefined,
      cause ? { cause } : undefined,
    );
    const entry = ERROR_CATALOG.CLOCK_SYNC_TRANSPORT_FAILED;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.server = server;
  }
}

// ---------------------------------------------------------------------------
// Malformed reply
// ---------------------------------------------------------------------------

/**
 * The time server answered, but the reply could not be decoded into a usable
 * timestamp.
 */
export class ClockSyncMalformedReplyError extends ClockSyncError {
  readonly _tag = "ExternalError" as const;
  readonly code = "CLOCK_SYNC_MALFORMED_REPLY" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly reason: string;

  constructor(reason: string) {
    super(`Malformed time server reply: ${reason}`);
    const entry = ERROR_CATALOG.CLOCK_SYNC_MALFORMED_REPLY;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.reason = reason;
  }
}

// ---------------------------------------------------------------------------
// Clock set failed
// ---------------------------------------------------------------------------

/**
 * The clock setter refused the time received from the server.
 */
export class ClockSetFailedError extends ClockSyncError {
  readonly _tag = "InternalError" as const;
  readonly code = "CLOCK_SYNC_CLOCK_SET_FAILED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly serverTime: number;

  constructor(serverTime: number, cause?: Error) {
    super(
      `Failed to set time to ${serverTime}`,
      undefined,
      undefined,
      cause ? { cause } : undefined,
    );
    const entry = ERROR_CATALOG.CLOCK_SYNC_CLOCK_SET_FAILED;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.serverTime = serverTime;
  }
}

// ---------------------------------------------------------------------------
// Observer failed
// ---------------------------------------------------------------------------

/**
 * A time change observer threw while handling a clock step.
 */
export class TimeChangeObserverError extends ClockSyncError {
  readonly _tag = "InternalError" as const;
  readonly code = "CLOCK_SYNC_OBSERVER_FAILED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly observerIndex: number;

  constructor(observerIndex: number, cause?: Error) {
    super(
      `Time change observer #${observerIndex} failed: ${cause?.message ?? "unknown error"}`,
      undefined,
      undefined,
      cause ? { cause } : undefined,
    );
    const entry = ERROR_CATALOG.CLOCK_SYNC_OBSERVER_FAILED;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.observerIndex = observerIndex;
  }
}
