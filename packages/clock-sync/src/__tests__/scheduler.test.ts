import {
  ClockSetFailedError,
  ClockSyncConfigurationError,
  ClockSyncMalformedReplyError,
  ClockSyncTransportError,
  TimeChangeObserverError,
} from "@clockwork/errors";
import { describe, expect, it, vi } from "vitest";
import { ClockSyncScheduler, type ClockSyncSchedulerOptions } from "../scheduler.js";
import type { ClockSyncConfig, ScheduledAttempt, SyncSuccess } from "../types.js";
import { FakeClock } from "./helpers/fake-clock.js";
import { createRecordingLogger, MockLinkSource, MockSyncClient } from "./helpers/mock-client.js";

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

const TEST_CONFIG: ClockSyncConfig = { retryMinSeconds: 10, retryMaxSeconds: 300 };
const SERVER_TIME = 1_700_000_000.25;

function setup(overrides: Partial<ClockSyncSchedulerOptions> = {}) {
  const clock = new FakeClock();
  const client = new MockSyncClient();
  const setter = { setTime: vi.fn((_seconds: number) => true) };
  const logger = createRecordingLogger();
  const scheduler = new ClockSyncScheduler({
    config: TEST_CONFIG,
    client,
    clockSetter: setter,
    clock,
    random: () => 0.5,
    logger,
    ...overrides,
  });

  const scheduled: ScheduledAttempt[] = [];
  const errors: Error[] = [];
  scheduler.on("scheduled", (attempt) => scheduled.push(attempt));
  scheduler.on("error", (error) => errors.push(error));

  return { scheduler, clock, client, setter, logger, scheduled, errors };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("ClockSyncScheduler", () => {
  describe("constructor", () => {
    it("should reject an invalid config", () => {
      expect(
        () =>
          new ClockSyncScheduler({
            config: { retryMinSeconds: 0 },
            client: new MockSyncClient(),
            clockSetter: { setTime: () => true },
          }),
      ).toThrow(ClockSyncConfigurationError);
    });

    it("should start idle", () => {
      const { scheduler, clock } = setup();
      expect(scheduler.synced).toBe(false);
      expect(scheduler.currentBackoffMs).toBe(0);
      expect(clock.pendingTimers).toBe(0);
    });
  });

  describe("scheduleNext", () => {
    it("should arm the minimum backoff before any success", () => {
      const { scheduler, clock, scheduled } = setup();

      expect(scheduler.scheduleNext()).toBe(10_000);
      expect(clock.nextTimerDelay).toBe(10_000);
      expect(scheduler.currentBackoffMs).toBe(10_000);
      expect(scheduled).toEqual([{ delayMs: 10_000, regime: "backoff" }]);
    });

    it("should be a no-op while a timer is armed", () => {
      const { scheduler, clock } = setup();

      scheduler.scheduleNext();
      expect(scheduler.scheduleNext()).toBeUndefined();
      expect(clock.pendingTimers).toBe(1);
      expect(scheduler.currentBackoffMs).toBe(10_000);
    });

    it("should do nothing when disabled", () => {
      const { scheduler, clock } = setup({ config: { enabled: false } });

      expect(scheduler.scheduleNext()).toBeUndefined();
      expect(clock.pendingTimers).toBe(0);
    });

    it("should double the backoff on every failed attempt and clamp at the maximum", () => {
      const { scheduler, clock, client, scheduled } = setup();

      scheduler.start();
      for (let i = 0; i < 9; i++) {
        clock.advanceToNextTimer();
        client.fail();
      }

      expect(scheduled.map((s) => s.delayMs)).toEqual([
        10_000, 20_000, 40_000, 80_000, 160_000, 300_000, 300_000, 300_000, 300_000, 300_000,
      ]);
      expect(scheduled.every((s) => s.regime === "backoff")).toBe(true);
      expect(client.connectCalls).toHaveLength(9);
    });

    it("should keep delays within the jittered backoff bounds", () => {
      const { scheduler, clock, client, scheduled } = setup({ random: Math.random });

      scheduler.handleLinkUp();
      client.fail();
      const backoffs = [scheduler.currentBackoffMs];

      for (let failure = 2; failure <= 10; failure++) {
        clock.advanceToNextTimer();
        client.fail();
        backoffs.push(scheduler.currentBackoffMs);
      }

      const delays = scheduled.map((s) => s.delayMs);
      expect(delays).toHaveLength(10);

      // First failure
      expect(delays[0]).toBeGreaterThanOrEqual(9_000);
      expect(delays[0]).toBeLessThanOrEqual(11_000);
      // Second consecutive failure
      expect(delays[1]).toBeGreaterThanOrEqual(18_000);
      expect(delays[1]).toBeLessThanOrEqual(22_000);
      // Tenth consecutive failure
      expect(delays[9]).toBeGreaterThanOrEqual(270_000);
      expect(delays[9]).toBeLessThanOrEqual(330_000);

      for (let i = 1; i < backoffs.length; i++) {
        expect(backoffs[i]).toBeGreaterThanOrEqual(backoffs[i - 1] ?? 0);
      }
      for (const backoff of backoffs) {
        expect(backoff).toBeGreaterThanOrEqual(10_000);
        expect(backoff).toBeLessThanOrEqual(300_000);
      }
    });
  });

  describe("successful sync", () => {
    it("should set the clock, notify observers with the step and switch to the update interval", () => {
      const { scheduler, clock, client, setter, scheduled } = setup();
      const deltas: number[] = [];
      scheduler.registerTimeChangeObserver((seen: number[], delta) => seen.push(delta), deltas);

      scheduler.start();
      clock.advanceToNextTimer(); // now = 10 s
      client.connected();
      expect(client.requests).toEqual([1]);

      client.reply(SERVER_TIME);

      expect(setter.setTime).toHaveBeenCalledWith(SERVER_TIME);
      expect(deltas).toEqual([SERVER_TIME - 10]);
      expect(scheduler.synced).toBe(true);
      expect(scheduler.currentBackoffMs).toBe(0);
      expect(client.forceClosed).toEqual([1]);
      expect(clock.pendingTimers).toBe(1);
      expect(clock.nextTimerDelay).toBe(7_200_000);
      expect(scheduled.at(-1)).toEqual({ delayMs: 7_200_000, regime: "steady" });
    });

    it("should emit a sync event", () => {
      const { scheduler, clock, client } = setup();
      const syncs: SyncSuccess[] = [];
      scheduler.on("sync", (success) => syncs.push(success));

      clock.advance(4_000);
      scheduler.attemptSync();
      client.reply(SERVER_TIME);

      expect(syncs).toEqual([
        { server: "time.google.com", serverTime: SERVER_TIME, deltaSeconds: SERVER_TIME - 4 },
      ]);
    });

    it("should notify observers once each, most recently registered first", () => {
      const { scheduler, client } = setup();
      const calls: string[] = [];
      for (const name of ["first", "second", "third"]) {
        scheduler.registerTimeChangeObserver((ctx: string, delta) => calls.push(`${ctx}:${delta}`), name);
      }

      scheduler.attemptSync();
      client.reply(100);

      expect(calls).toEqual(["third:100", "second:100", "first:100"]);
    });

    it("should keep notifying after an observer throws", () => {
      const { scheduler, client, errors } = setup();
      const seen: number[] = [];
      scheduler.registerTimeChangeObserver((ctx: number[], delta) => ctx.push(delta), seen);
      scheduler.registerTimeChangeObserver(() => {
        throw new Error("boom");
      }, undefined);

      scheduler.attemptSync();
      client.reply(50);

      expect(seen).toEqual([50]);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(TimeChangeObserverError);
      expect(errors[0]?.message).toBe("Time change observer #0 failed: boom");
      expect(scheduler.synced).toBe(true);
    });

    it("should reset a grown backoff", () => {
      const { scheduler, clock, client } = setup();

      scheduler.start();
      clock.advanceToNextTimer();
      client.fail();
      clock.advanceToNextTimer();
      expect(scheduler.currentBackoffMs).toBe(40_000);

      client.reply(SERVER_TIME);
      expect(scheduler.currentBackoffMs).toBe(0);
      expect(clock.nextTimerDelay).toBe(7_200_000);
    });

    it("should keep the steady cadence when a later resync fails", () => {
      const { scheduler, clock, client, scheduled } = setup();

      scheduler.attemptSync();
      client.reply(SERVER_TIME);
      clock.advanceToNextTimer();
      client.fail();

      expect(scheduler.synced).toBe(true);
      expect(scheduler.currentBackoffMs).toBe(0);
      expect(scheduled.at(-1)).toEqual({ delayMs: 7_200_000, regime: "steady" });
      expect(clock.nextTimerDelay).toBe(7_200_000);
    });
  });

  describe("failures", () => {
    it("should retry through the close path after a transport failure", () => {
      const { scheduler, clock, client, errors } = setup();

      expect(scheduler.attemptSync()).toBe(true);
      client.fail("timed out");

      expect(client.forceClosed).toEqual([1]);
      expect(errors[0]).toBeInstanceOf(ClockSyncTransportError);
      expect(errors[0]?.message).toBe("Time server time.google.com unreachable: timed out");
      expect(clock.nextTimerDelay).toBe(10_000);
      expect(scheduler.status().sessionActive).toBe(false);
    });

    it("should report a malformed reply and retry", () => {
      const { scheduler, clock, client, errors } = setup();

      scheduler.attemptSync();
      client.malformed("invalid stratum 16");

      expect(errors[0]).toBeInstanceOf(ClockSyncMalformedReplyError);
      expect(errors[0]?.message).toBe("Malformed time server reply: invalid stratum 16");
      expect(client.forceClosed).toEqual([1]);
      expect(clock.nextTimerDelay).toBe(10_000);
    });

    it("should leave sync state alone when the clock setter refuses the time", () => {
      const { scheduler, clock, client, setter, logger, errors } = setup();
      setter.setTime.mockReturnValue(false);

      scheduler.attemptSync();
      client.reply(123.5);

      expect(errors[0]).toBeInstanceOf(ClockSetFailedError);
      expect(logger.lines).toContainEqual({ level: "error", message: "Failed to set time to 123.5" });
      expect(scheduler.synced).toBe(false);
      expect(client.forceClosed).toEqual([1]);
      expect(clock.nextTimerDelay).toBe(10_000);
      expect(scheduler.status().failures).toBe(1);
    });

    it("should treat a throwing clock setter as a refusal", () => {
      const { scheduler, client, setter, errors } = setup();
      setter.setTime.mockImplementation(() => {
        throw new Error("permission denied");
      });

      scheduler.attemptSync();
      client.reply(123.5);

      expect(errors[0]).toBeInstanceOf(ClockSetFailedError);
      expect(errors[0]?.cause).toBeInstanceOf(Error);
      expect(scheduler.synced).toBe(false);
    });

    it("should return false when the client cannot connect", () => {
      const { scheduler, client, errors } = setup();
      client.refuseConnect = true;

      expect(scheduler.attemptSync()).toBe(false);
      expect(errors[0]).toBeInstanceOf(ClockSyncTransportError);
      expect(errors[0]?.message).toBe(
        "Time server time.google.com unreachable: could not open a connection",
      );
      expect(scheduler.status()).toMatchObject({ sessionActive: false, attempts: 0, failures: 1 });
    });

    it("should not throw on failures when no error listener is attached", () => {
      const client = new MockSyncClient();
      const scheduler = new ClockSyncScheduler({
        config: TEST_CONFIG,
        client,
        clockSetter: { setTime: () => true },
        clock: new FakeClock(),
        logger: createRecordingLogger(),
      });

      scheduler.attemptSync();
      expect(() => client.fail()).not.toThrow();
    });
  });

  describe("session lifecycle", () => {
    it("should call scheduleNext exactly once per closed session", () => {
      const { scheduler, client } = setup();
      const spy = vi.spyOn(scheduler, "scheduleNext");

      scheduler.attemptSync();
      client.fail();
      expect(spy).toHaveBeenCalledTimes(1);

      scheduler.attemptSync();
      client.malformed("zero transmit timestamp");
      expect(spy).toHaveBeenCalledTimes(2);
    });

    it("should ignore events from a session dropped by stop()", () => {
      const { scheduler, clock, client, setter } = setup();
      client.autoClose = false;

      scheduler.start();
      scheduler.handleLinkUp();
      scheduler.stop();
      client.reply(SERVER_TIME, 1);
      client.close(1);

      expect(client.forceClosed).toEqual([1]);
      expect(setter.setTime).not.toHaveBeenCalled();
      expect(clock.pendingTimers).toBe(0);
    });

    it("should send the request only after the session connects", () => {
      const { scheduler, client } = setup();

      scheduler.attemptSync();
      expect(client.requests).toEqual([]);
      client.connected();
      expect(client.requests).toEqual([1]);
    });

    it("should arm a safety-net retry when the timer fires", () => {
      const { scheduler, clock, client } = setup();
      client.autoClose = false;

      scheduler.start();
      clock.advanceToNextTimer();

      expect(scheduler.status().sessionActive).toBe(true);
      expect(clock.nextTimerDelay).toBe(20_000);
    });
  });

  describe("handleLinkUp", () => {
    it("should attempt immediately and arm a retry", () => {
      const { scheduler, clock, client } = setup();

      scheduler.handleLinkUp();

      expect(client.connectCalls).toEqual(["time.google.com"]);
      expect(clock.nextTimerDelay).toBe(10_000);
    });

    it("should not open a second session while one is active", () => {
      const { scheduler, client } = setup();
      client.autoClose = false;

      scheduler.handleLinkUp();
      scheduler.handleLinkUp();

      expect(client.connectCalls).toHaveLength(1);
      expect(client.forceClosed).toEqual([1]);
      expect(scheduler.status().sessionActive).toBe(true);
    });

    it("should not report the session it closes as a failure", () => {
      const { scheduler, clock, client, logger, errors } = setup();

      scheduler.handleLinkUp();
      scheduler.handleLinkUp();

      expect(client.forceClosed).toEqual([1]);
      expect(errors).toEqual([]);
      expect(scheduler.status().failures).toBe(0);
      expect(scheduler.status().sessionActive).toBe(false);
      expect(logger.lines.filter((line) => line.level === "warn")).toEqual([]);
      expect(clock.nextTimerDelay).toBe(10_000);

      scheduler.attemptSync();
      client.fail();
      expect(errors).toHaveLength(1);
      expect(scheduler.status().failures).toBe(1);
    });

    it("should do nothing when disabled", () => {
      const { scheduler, clock, client } = setup({ config: { enabled: false } });

      scheduler.handleLinkUp();

      expect(client.connectCalls).toEqual([]);
      expect(clock.pendingTimers).toBe(0);
    });

    it("should never have more than one session open across link-ups and timer fires", () => {
      const { scheduler, clock, client } = setup();
      scheduler.start();

      const steps: (() => void)[] = [
        () => scheduler.handleLinkUp(),
        () => clock.advanceToNextTimer(),
        () => scheduler.handleLinkUp(),
        () => scheduler.handleLinkUp(),
        () => client.fail(),
        () => clock.advanceToNextTimer(),
        () => scheduler.handleLinkUp(),
        () => clock.advanceToNextTimer(),
      ];
      for (const step of steps) {
        step();
        expect(client.openSessions).toBeLessThanOrEqual(1);
      }
    });
  });

  describe("configuration provider", () => {
    it("should read the server address before every attempt", () => {
      let current: ClockSyncConfig = { ...TEST_CONFIG, serverAddress: "a.example" };
      const { scheduler, clock, client } = setup({ config: () => current });

      scheduler.attemptSync();
      client.fail();
      current = { ...current, serverAddress: "b.example" };
      clock.advanceToNextTimer();

      expect(client.connectCalls).toEqual(["a.example", "b.example"]);
    });

    it("should keep the last good config when the provider throws", () => {
      let broken = false;
      const { scheduler, client, logger } = setup({
        config: () => {
          if (broken) throw new Error("store offline");
          return { serverAddress: "a.example" };
        },
      });

      broken = true;
      expect(scheduler.attemptSync()).toBe(true);
      expect(client.connectCalls).toEqual(["a.example"]);
      expect(logger.lines).toContainEqual({
        level: "warn",
        message: "Config reload failed, keeping previous config: store offline",
      });
    });

    it("should stop attempting when disabled at runtime", () => {
      let current: ClockSyncConfig = TEST_CONFIG;
      const { scheduler, client } = setup({ config: () => current });

      current = { enabled: false };
      expect(scheduler.attemptSync()).toBe(false);
      expect(scheduler.scheduleNext()).toBeUndefined();
      expect(client.connectCalls).toEqual([]);
    });
  });

  describe("start / stop", () => {
    it("should subscribe to link events and arm the first attempt", () => {
      const linkSource = new MockLinkSource();
      const { scheduler, clock, client } = setup({ linkSource });

      scheduler.start();
      expect(linkSource.handlers).toHaveLength(1);
      expect(clock.pendingTimers).toBe(1);

      linkSource.fire();
      expect(client.connectCalls).toHaveLength(1);
    });

    it("should be idempotent", () => {
      const linkSource = new MockLinkSource();
      const { scheduler, clock } = setup({ linkSource });

      scheduler.start();
      scheduler.start();
      expect(linkSource.handlers).toHaveLength(1);

      scheduler.stop();
      scheduler.stop();
      expect(linkSource.handlers).toHaveLength(0);
      expect(clock.pendingTimers).toBe(0);
      expect(scheduler.isRunning).toBe(false);
    });

    it("should close the active session on stop", () => {
      const { scheduler, client } = setup();

      scheduler.start();
      scheduler.handleLinkUp();
      scheduler.stop();

      expect(client.forceClosed).toEqual([1]);
      expect(scheduler.status().sessionActive).toBe(false);
    });
  });

  describe("status", () => {
    it("should describe the current state", () => {
      const { scheduler, clock, client } = setup();

      scheduler.start();
      clock.advanceToNextTimer();
      client.reply(SERVER_TIME);

      expect(scheduler.status()).toEqual({
        running: true,
        enabled: true,
        synced: true,
        currentBackoffMs: 0,
        sessionActive: false,
        timerArmed: true,
        nextAttemptAt: 10_000 + 7_200_000,
        lastSyncAt: 10_000,
        lastDeltaSeconds: SERVER_TIME - 10,
        attempts: 1,
        failures: 0,
      });
    });
  });
});
