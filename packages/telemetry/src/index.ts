/**
 * @clockwork/telemetry: OpenTelemetry instrumentation for clock sync.
 *
 * Public API:
 * - startSpan(): explicit span lifecycle for callback-driven sessions
 * - getSyncAttempts / getSyncOutcomes / getClockStep: OTel metrics
 */

export { SpanStatusCode, trace } from "@opentelemetry/api";
export { getClockStep, getSyncAttempts, getSyncOutcomes } from "./metrics.js";
export { startSpan } from "./span-helpers.js";
export type { SpanAttributes, SpanAttributeValue, SpanHandle } from "./types.js";
