import { createSocket } from "node:dgram";
import { isIPv6 } from "node:net";
import { ClockSyncTransportError } from "@clockwork/errors";
import { defaultClock } from "../clock.js";
import { DEFAULT_REQUEST_TIMEOUT_MS, SNTP_PORT } from "../constants.js";
import type {
  Clock,
  SyncClient,
  SyncClientEvent,
  SyncEventHandler,
  SyncSession,
  TimerHandle,
} from "../types.js";
import { decodeSntpReply, encodeSntpRequest } from "./codec.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * The slice of `dgram.Socket` the client uses.
 */
export interface UdpSocketLike {
  connect(port: number, address?: string): void;
  send(msg: Uint8Array, callback?: (error: Error | null) => void): void;
  close(): void;
  on(event: string, handler: (...args: unknown[]) => void): void;
}

/**
 * Factory for creating UDP sockets.
 * Injectable for testing.
 */
export type UdpSocketFactory = (type: "udp4" | "udp6") => UdpSocketLike;

export interface UdpSyncClientOptions {
  readonly clock?: Clock;
  /** How long to wait for a reply after the request is sent */
  readonly requestTimeoutMs?: number;
  readonly socketFactory?: UdpSocketFactory;
}

export interface ServerEndpoint {
  readonly host: string;
  readonly port: number;
}

interface SessionState {
  readonly session: SyncSession;
  readonly socket: UdpSocketLike;
  readonly onEvent: SyncEventHandler;
  timer: TimerHandle | undefined;
  outcomeDelivered: boolean;
  closing: boolean;
  closed: boolean;
}

type SyncOutcome = Exclude<SyncClientEvent, { kind: "connected" } | { kind: "closed" }>;

// ---------------------------------------------------------------------------
// Address parsing
// ---------------------------------------------------------------------------

function parsePort(raw: string): number | undefined {
  if (!/^\d+$/.test(raw)) return undefined;
  const port = Number(raw);
  return port >= 1 && port <= 65_535 ? port : undefined;
}

/**
 * Split `host`, `host:port`, `[v6]` or `[v6]:port` into host and port.
 * A bare IPv6 literal (more than one colon, no brackets) is taken whole.
 * Returns undefined when the address is empty or the port is invalid.
 */
export function parseServerAddress(address: string): ServerEndpoint | undefined {
  const trimmed = address.trim();
  if (trimmed === "") return undefined;

  if (trimmed.startsWith("[")) {
    const match = /^\[([^\]]+)\](?::(.+))?$/.exec(trimmed);
    if (!match?.[1]) return undefined;
    const port = match[2] === undefined ? SNTP_PORT : parsePort(match[2]);
    return port === undefined ? undefined : { host: match[1], port };
  }

  const firstColon = trimmed.indexOf(":");
  if (firstColon === -1 || firstColon !== trimmed.lastIndexOf(":")) {
    return { host: trimmed, port: SNTP_PORT };
  }

  const host = trimmed.slice(0, firstColon);
  const port = parsePort(trimmed.slice(firstColon + 1));
  return host === "" || port === undefined ? undefined : { host, port };
}

// ---------------------------------------------------------------------------
// UdpSyncClient
// ---------------------------------------------------------------------------

/**
 * SNTP client over connected UDP sockets, one socket per session.
 *
 * Every session that `connect` returns delivers at most one outcome and then
 * exactly one `closed`. The socket is closed as soon as an outcome has been
 * delivered, so callers that do not call `forceClose` still see `closed`.
 */
export class UdpSyncClient implements SyncClient {
  private readonly clock: Clock;
  private readonly requestTimeoutMs: number;
  private readonly socketFactory: UdpSocketFactory;
  private readonly sessions = new Map<number, SessionState>();
  private nextSessionId = 1;

  constructor(options: UdpSyncClientOptions = {}) {
    this.clock = options.clock ?? defaultClock;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.socketFactory = options.socketFactory ?? ((type) => createSocket(type));
  }

  connect(serverAddress: string, onEvent: SyncEventHandler): SyncSession | null {
    const endpoint = parseServerAddress(serverAddress);
    if (!endpoint) return null;

    let socket: UdpSocketLike;
    try {
      socket = this.socketFactory(isIPv6(endpoint.host) ? "udp6" : "udp4");
    } catch {
      return null;
    }

    const session: SyncSession = { id: this.nextSessionId++, server: serverAddress };
    const state: SessionState = {
      session,
      socket,
      onEvent,
      timer: undefined,
      outcomeDelivered: false,
      closing: false,
      closed: false,
    };

    socket.on("connect", () => {
      if (!state.closing) onEvent({ kind: "connected" }, session);
    });
    socket.on("message", (msg: unknown) => {
      this.handleMessage(state, msg);
    });
    socket.on("error", (err: unknown) => {
      const cause = err instanceof Error ? err : new Error(String(err));
      this.fail(state, cause.message, cause);
    });
    socket.on("close", () => {
      this.finish(state);
    });

    try {
      socket.connect(endpoint.port, endpoint.host);
    } catch {
      // The caller never sees this session, so it gets no events
      state.closed = true;
      this.teardown(state);
      return null;
    }

    this.sessions.set(session.id, state);
    return session;
  }

  sendRequest(session: SyncSession): void {
    const state = this.sessions.get(session.id);
    if (!state || state.closing) return;

    this.clearTimer(state);
    state.timer = this.clock.setTimeout(() => {
      state.timer = undefined;
      this.fail(state, `no reply within ${this.requestTimeoutMs}ms`);
    }, this.requestTimeoutMs);

    state.socket.send(encodeSntpRequest(), (error) => {
      if (error) this.fail(state, `send failed: ${error.message}`, error);
    });
  }

  forceClose(session: SyncSession): void {
    const state = this.sessions.get(session.id);
    if (!state) return;
    this.deliverOutcome(state, {
      kind: "transport-failure",
      error: new ClockSyncTransportError(state.session.server, "closed before reply"),
    });
    this.teardown(state);
  }

  /**
   * Number of sessions whose `closed` event is still pending.
   */
  get openSessions(): number {
    return this.sessions.size;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private handleMessage(state: SessionState, msg: unknown): void {
    if (!(msg instanceof Uint8Array)) return;
    const result = decodeSntpReply(msg);
    if (result.success) {
      this.deliverOutcome(state, { kind: "reply", serverTime: result.data.serverTime });
    } else {
      this.deliverOutcome(state, { kind: "malformed-reply", reason: result.error.reason });
    }
    this.teardown(state);
  }

  private fail(state: SessionState, reason: string, cause?: Error): void {
    this.deliverOutcome(state, {
      kind: "transport-failure",
      error: new ClockSyncTransportError(state.session.server, reason, cause),
    });
    this.teardown(state);
  }

  private deliverOutcome(state: SessionState, outcome: SyncOutcome): void {
    if (state.outcomeDelivered || state.closed) return;
    state.outcomeDelivered = true;
    this.clearTimer(state);
    state.onEvent(outcome, state.session);
  }

  private teardown(state: SessionState): void {
    if (state.closing) return;
    state.closing = true;
    this.clearTimer(state);
    try {
      state.socket.close();
    } catch {
      // Already closed: no "close" event will follow
      this.finish(state);
    }
  }

  private finish(state: SessionState): void {
    if (state.closed) return;
    this.deliverOutcome(state, {
      kind: "transport-failure",
      error: new ClockSyncTransportError(state.session.server, "socket closed"),
    });
    state.closed = true;
    state.closing = true;
    this.clearTimer(state);
    this.sessions.delete(state.session.id);
    state.onEvent({ kind: "closed" }, state.session);
  }

  private clearTimer(state: SessionState): void {
    if (state.timer !== undefined) {
      this.clock.clearTimeout(state.timer);
      state.timer = undefined;
    }
  }
}
