/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the Clockwork packages maps to an HTTP status,
 * a gRPC canonical code and one of the base error types.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: CLOCKSYNC
 */

/**
 * Behavioral category of an error code, mirrored by each class's `_tag`.
 */
export type BaseErrorType = "ValidationError" | "ExternalError" | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // CLOCK SYNC ERRORS - Time server synchronization
  // ============================================================================
  CLOCK_SYNC_CONFIGURATION_INVALID: {
    domain: "clocksync",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid clock sync configuration",
    description: "The clock sync configuration is missing a field or holds an invalid value",
  },
  CLOCK_SYNC_TRANSPORT_FAILED: {
    domain: "clocksync",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Time server unreachable",
    description: "The request to the time server could not be sent or was not answered",
  },
  CLOCK_SYNC_MALFORMED_REPLY: {
    domain: "clocksync",
    httpStatus: 502,
    grpcCode: "DATA_LOSS" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Malformed time server reply",
    description: "The time server answered with a reply that could not be used",
  },
  CLOCK_SYNC_CLOCK_SET_FAILED: {
    domain: "clocksync",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Failed to set clock",
    description: "The clock setter refused the time received from the server",
  },
  CLOCK_SYNC_OBSERVER_FAILED: {
    domain: "clocksync",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Time change observer failed",
    description: "A registered time change observer threw while handling a clock step",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * gRPC canonical status codes used in the catalog
 */
export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];
