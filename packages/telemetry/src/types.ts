/**
 * Telemetry types.
 */

/**
 * Standard span attribute types accepted by OpenTelemetry.
 */
export type SpanAttributeValue = string | number | boolean;

/**
 * Record of span attributes.
 */
export type SpanAttributes = Record<string, SpanAttributeValue>;

/**
 * A span opened for work that completes through callbacks rather than a
 * promise. `end()` is idempotent; only the first call is recorded.
 */
export interface SpanHandle {
  setAttributes(attributes: SpanAttributes): void;
  end(error?: unknown): void;
}
