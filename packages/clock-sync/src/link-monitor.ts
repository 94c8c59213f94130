/**
 * Network link monitor.
 *
 * Node has no portable "got an IP" notification, so the monitor polls the
 * interface table and reports non-internal addresses that were absent from
 * the previous poll. The first poll runs on `start()` against an empty
 * table, so a host that is already online reports its addresses at once.
 */

import { EventEmitter } from "node:events";
import { type NetworkInterfaceInfo, networkInterfaces } from "node:os";
import { defaultClock } from "./clock.js";
import { DEFAULT_LINK_POLL_INTERVAL_MS } from "./constants.js";
import type { Clock, LinkEventSource, TimerHandle } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type InterfaceReader = () => NodeJS.Dict<NetworkInterfaceInfo[]>;

export interface IpAcquired {
  /** Addresses present now that were missing from the previous poll */
  readonly addresses: readonly string[];
}

/** Events emitted by NetworkLinkMonitor. */
export interface LinkMonitorEvents {
  ipAcquired: [IpAcquired];
  error: [Error];
}

export interface NetworkLinkMonitorOptions {
  readonly readInterfaces?: InterfaceReader;
  readonly pollIntervalMs?: number;
  readonly clock?: Clock;
}

function externalAddresses(table: NodeJS.Dict<NetworkInterfaceInfo[]>): Set<string> {
  const addresses = new Set<string>();
  for (const infos of Object.values(table)) {
    for (const info of infos ?? []) {
      if (!info.internal) addresses.add(info.address);
    }
  }
  return addresses;
}

// ---------------------------------------------------------------------------
// NetworkLinkMonitor
// ---------------------------------------------------------------------------

/**
 * Emits `ipAcquired` once per poll in which at least one new external
 * address shows up. A failing interface read keeps the previous table and is
 * emitted as `error` when a listener is present.
 */
export class NetworkLinkMonitor extends EventEmitter<LinkMonitorEvents> implements LinkEventSource {
  private readonly readInterfaces: InterfaceReader;
  private readonly pollIntervalMs: number;
  private readonly clock: Clock;
  private known: ReadonlySet<string> = new Set();
  private timer: TimerHandle | undefined;
  private running = false;

  constructor(options: NetworkLinkMonitorOptions = {}) {
    super();
    this.readInterfaces = options.readInterfaces ?? networkInterfaces;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_LINK_POLL_INTERVAL_MS;
    this.clock = options.clock ?? defaultClock;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.tick();
  }

  stop(): void {
    this.running = false;
    if (this.timer !== undefined) {
      this.clock.clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  /**
   * Read the interface table once and emit for new addresses.
   * Returns the newly seen addresses.
   */
  poll(): readonly string[] {
    let current: Set<string>;
    try {
      current = externalAddresses(this.readInterfaces());
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (this.listenerCount("error") > 0) {
        this.emit("error", error);
      }
      return [];
    }

    const added = [...current].filter((address) => !this.known.has(address));
    this.known = current;
    if (added.length > 0) {
      this.emit("ipAcquired", { addresses: added });
    }
    return added;
  }

  onIpAcquired(handler: () => void): () => void {
    const listener = (): void => handler();
    this.on("ipAcquired", listener);
    return () => {
      this.off("ipAcquired", listener);
    };
  }

  get isRunning(): boolean {
    return this.running;
  }

  private tick(): void {
    this.timer = undefined;
    this.poll();
    if (this.running) {
      this.timer = this.clock.setTimeout(() => this.tick(), this.pollIntervalMs);
    }
  }
}
