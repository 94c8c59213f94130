import { LOG_TAG } from "./constants.js";
import type { ClockSyncLogger } from "./types.js";

/**
 * Console logger with a consistent `[ClockSync]` prefix.
 */
export function createConsoleLogger(tag: string = LOG_TAG): ClockSyncLogger {
  return {
    debug: (message) => console.debug(`[${tag}] ${message}`),
    info: (message) => console.info(`[${tag}] ${message}`),
    warn: (message) => console.warn(`[${tag}] ${message}`),
    error: (message) => console.error(`[${tag}] ${message}`),
  };
}
