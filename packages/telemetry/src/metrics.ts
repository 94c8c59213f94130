/**
 * OTel metrics for clock synchronization.
 *
 * Lazily initialized: meters are only created on first access.
 * When no meter provider is registered, these return no-op instruments.
 */

import type { Counter, Histogram } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";

const METER_NAME = "clockwork";

let _syncAttempts: Counter | undefined;
let _syncOutcomes: Counter | undefined;
let _clockStep: Histogram | undefined;

/**
 * Counter of sync sessions started against a time server.
 */
export function getSyncAttempts(): Counter {
  if (_syncAttempts === undefined) {
    _syncAttempts = metrics.getMeter(METER_NAME).createCounter("clockwork.sync.attempts", {
      description: "Sync sessions started",
    });
  }
  return _syncAttempts;
}

/**
 * Counter of finished sync sessions, labelled with `outcome`
 * (`success`, `malformed`, `transport`, `clock-set`).
 */
export function getSyncOutcomes(): Counter {
  if (_syncOutcomes === undefined) {
    _syncOutcomes = metrics.getMeter(METER_NAME).createCounter("clockwork.sync.outcomes", {
      description: "Sync session outcomes",
    });
  }
  return _syncOutcomes;
}

/**
 * Histogram of applied clock steps, in seconds.
 */
export function getClockStep(): Histogram {
  if (_clockStep === undefined) {
    _clockStep = metrics.getMeter(METER_NAME).createHistogram("clockwork.clock.step", {
      description: "Magnitude of clock steps applied after a sync",
      unit: "s",
    });
  }
  return _clockStep;
}
