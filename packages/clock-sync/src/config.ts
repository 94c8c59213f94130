/**
 * Configuration validation and resolution.
 */

import { ClockSyncConfigurationError, type ValidationIssue } from "@clockwork/errors";
import type { ZodIssue } from "zod";
import {
  type ClockSyncConfig,
  type ClockSyncConfigSource,
  ClockSyncConfigSchema,
  type ResolvedClockSyncConfig,
} from "./types.js";

function toIssue(issue: ZodIssue): ValidationIssue {
  return {
    field: issue.path.join("."),
    message: issue.message,
    code: issue.code,
  };
}

/**
 * Validates and resolves a {@link ClockSyncConfig} into a fully-resolved
 * config with all defaults applied.
 *
 * An enabled config must name a server; a disabled one may leave it empty.
 *
 * @throws {ClockSyncConfigurationError} on invalid input
 */
export function resolveClockSyncConfig(config: ClockSyncConfig = {}): ResolvedClockSyncConfig {
  const result = ClockSyncConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map(toIssue);
    throw new ClockSyncConfigurationError(
      issues.map((i) => (i.field ? `${i.field}: ${i.message}` : i.message)).join("; "),
      issues,
    );
  }

  const resolved = result.data;
  if (resolved.enabled && resolved.serverAddress === "") {
    throw new ClockSyncConfigurationError("serverAddress is required when enabled", [
      { field: "serverAddress", message: "Required when enabled", code: "custom" },
    ]);
  }

  return resolved;
}

/**
 * Turn a static config or a provider into a reader that yields a resolved
 * config on every call.
 */
export function createConfigReader(source: ClockSyncConfigSource): () => ResolvedClockSyncConfig {
  if (typeof source === "function") {
    return () => resolveClockSyncConfig(source());
  }
  const resolved = resolveClockSyncConfig(source);
  return () => resolved;
}
