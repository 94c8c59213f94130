/**
 * Span helper utilities for callback-driven work.
 *
 * A sync session opens when the client connects and finishes when the
 * transport reports its close, so spans are started and ended explicitly
 * instead of wrapping a single async function.
 */

import { SpanStatusCode, trace } from "@opentelemetry/api";
import type { SpanAttributes, SpanHandle } from "./types.js";

const TRACER_NAME = "clockwork";

/**
 * Start a named span that the caller ends once the work completes.
 *
 * - Sets provided attributes on the span
 * - `end(error)` records the exception and sets ERROR status
 * - `end()` sets OK status
 *
 * When no tracer provider is registered the returned handle drives a no-op
 * span.
 */
export function startSpan(name: string, attributes: SpanAttributes): SpanHandle {
  const span = trace.getTracer(TRACER_NAME).startSpan(name, { attributes });
  let ended = false;

  return {
    setAttributes(extra: SpanAttributes): void {
      if (ended) return;
      span.setAttributes(extra);
    },

    end(error?: unknown): void {
      if (ended) return;
      ended = true;
      if (error === undefined) {
        span.setStatus({ code: SpanStatusCode.OK });
      } else {
        if (error instanceof Error) {
          span.recordException(error);
        }
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: error instanceof Error ? error.message : String(error),
        });
      }
      span.end();
    },
  };
}
