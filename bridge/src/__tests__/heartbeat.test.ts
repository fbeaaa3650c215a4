/**
 * Tests for the progress heartbeat.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { Heartbeat } from "../heartbeat.js";
import { PlaybackReporter } from "../playback-reporter.js";
import { SessionClient } from "../session-client.js";
import { SessionResolver } from "../session-resolver.js";
import { FakeEngine } from "./helpers/fake-engine.js";
import { createFakeServer, TEST_HOSTNAME, type FakeServer } from "./helpers/fake-server.js";

const INTERVAL_MS = 60_000;

describe("Heartbeat", () => {
  let engine: FakeEngine;
  let server: FakeServer;
  let reporter: PlaybackReporter;
  let heartbeat: Heartbeat;

  beforeEach(() => {
    vi.useFakeTimers();
    engine = new FakeEngine();
    server = createFakeServer({
      sessions: [{ Id: "session-1", DeviceId: "device-1", AdditionalUsers: [] }],
    });
    vi.stubGlobal("fetch", server.fetch);
    const client = new SessionClient({
      hostname: TEST_HOSTNAME,
      token: "test-token",
      deviceId: "device-1",
      deviceName: "test-device",
    });
    reporter = new PlaybackReporter(engine, client, new SessionResolver(client, "device-1"));
    heartbeat = new Heartbeat(engine, reporter, INTERVAL_MS);
  });

  afterEach(() => {
    heartbeat.stop();
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  it("reports progress while playing", async () => {
    engine.load(["jellyfin:track:X"]);
    engine.state = "playing";

    expect(await heartbeat.tick()).toBe(true);
    expect(server.reports()).toEqual(["POST /Sessions/Playing/Progress"]);
  });

  it("reports progress while paused", async () => {
    engine.load(["jellyfin:track:X"]);
    engine.state = "paused";

    expect(await heartbeat.tick()).toBe(true);
    expect(server.reports()).toEqual(["POST /Sessions/Playing/Progress"]);
  });

  it("makes no call at all while stopped", async () => {
    engine.load(["jellyfin:track:X"]);
    engine.state = "stopped";

    expect(await heartbeat.tick()).toBe(false);
    expect(server.requests).toEqual([]);
  });

  it("skips the cycle when the server has no session", async () => {
    server.state.sessions = [];
    engine.load(["jellyfin:track:X"]);
    engine.state = "playing";

    expect(await heartbeat.tick()).toBe(false);
    expect(server.reports()).toEqual([]);
  });

  it("survives an engine failure", async () => {
    vi.spyOn(engine, "getState").mockRejectedValueOnce(new Error("engine gone"));
    expect(await heartbeat.tick()).toBe(false);
  });

  it("ticks immediately, then once per interval", async () => {
    engine.load(["jellyfin:track:X"]);
    engine.state = "playing";

    heartbeat.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(server.reports()).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(INTERVAL_MS - 1);
    expect(server.reports()).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(server.reports()).toHaveLength(2);

    await vi.advanceTimersByTimeAsync(INTERVAL_MS * 2);
    expect(server.reports()).toHaveLength(4);
  });

  it("stops ticking after stop()", async () => {
    engine.load(["jellyfin:track:X"]);
    engine.state = "playing";

    heartbeat.start();
    await vi.advanceTimersByTimeAsync(0);
    heartbeat.stop();
    await vi.advanceTimersByTimeAsync(INTERVAL_MS * 3);

    expect(server.reports()).toHaveLength(1);
    expect(heartbeat.isRunning).toBe(false);
  });

  it("refuses to start twice", () => {
    heartbeat.start();
    expect(() => heartbeat.start()).toThrow("already running");
  });

  it("skips a tick while the previous one is still in flight", async () => {
    engine.load(["jellyfin:track:X"]);
    engine.state = "playing";
    let release: () => void = () => {};
    vi.spyOn(engine, "getState").mockImplementationOnce(
      () =>
        new Promise((resolve) => {
          release = () => resolve("playing");
        }),
    );

    const first = heartbeat.tick();
    expect(await heartbeat.tick()).toBe(false);

    release();
    expect(await first).toBe(true);
    expect(server.reports()).toEqual(["POST /Sessions/Playing/Progress"]);
  });
});
