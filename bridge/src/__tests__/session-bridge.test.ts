/**
 * Tests for SessionBridge: wiring, serialization and lifecycle.
 *
 * Uses FakeEngine, an in-process command channel and the fake server;
 * nothing leaves the process.
 */
import { EventEmitter } from "events";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { loadConfig } from "../config.js";
import { SessionBridge, type CommandChannel } from "../session-bridge.js";
import { SessionClient } from "../session-client.js";
import { TokenNotFoundError } from "../token.js";
import { FakeEngine } from "./helpers/fake-engine.js";
import { createFakeServer, TEST_HOSTNAME, type FakeServer } from "./helpers/fake-server.js";

class FakeChannel extends EventEmitter implements CommandChannel {
  started = 0;
  stopped = 0;

  start(): void {
    this.started++;
  }

  stop(): void {
    this.stopped++;
  }
}

describe("SessionBridge", () => {
  let engine: FakeEngine;
  let channel: FakeChannel;
  let server: FakeServer;
  let bridge: SessionBridge;

  function createBridge(overrides: { additionalUsers?: string; seekSettleMs?: number } = {}): SessionBridge {
    const client = new SessionClient({
      hostname: TEST_HOSTNAME,
      token: "test-token",
      deviceId: "device-1",
      deviceName: "test-device",
    });
    return new SessionBridge({
      engine,
      client,
      channel,
      deviceId: "device-1",
      additionalUsers: overrides.additionalUsers ?? "",
      heartbeatIntervalMs: 3_600_000,
      seekSettleMs: overrides.seekSettleMs ?? 0,
    });
  }

  beforeEach(() => {
    engine = new FakeEngine();
    channel = new FakeChannel();
    server = createFakeServer({
      sessions: [{ Id: "session-1", DeviceId: "device-1", AdditionalUsers: [] }],
      users: [{ Id: "id-alice", Name: "alice" }],
    });
    vi.stubGlobal("fetch", server.fetch);
    bridge = createBridge();
  });

  afterEach(async () => {
    await bridge.stop();
    vi.unstubAllGlobals();
  });

  describe("start", () => {
    it("connects the engine and opens the command channel", async () => {
      await bridge.start();

      expect(engine.isConnected).toBe(true);
      expect(channel.started).toBe(1);
      expect(bridge.isRunning).toBe(true);
    });

    it("refuses to start twice", async () => {
      await bridge.start();
      await expect(bridge.start()).rejects.toThrow("already running");
    });

    it("attaches configured users once started", async () => {
      bridge = createBridge({ additionalUsers: "alice" });
      await bridge.start();
      await bridge.idle();

      expect(server.requests.filter((r) => r.method === "POST").map((r) => r.path)).toEqual([
        "/Sessions/session-1/User/id-alice",
      ]);
    });

    it("attaches users on demand", async () => {
      const outcomes = await bridge.attachUsers("alice");
      expect([...outcomes]).toEqual([["alice", "added"]]);
    });

    it("attaches no one when no users are configured", async () => {
      await bridge.start();
      await bridge.idle();

      expect(server.requests.some((r) => r.path.includes("/User/"))).toBe(false);
    });
  });

  describe("engine notifications", () => {
    beforeEach(async () => {
      await bridge.start();
      engine.load(["jellyfin:track:X"]);
      engine.state = "playing";
    });

    it("reports each notification in arrival order", async () => {
      engine.emit("stateChanged", { oldState: "stopped", newState: "playing" });
      engine.emit("seeked", { position: 1000 });
      engine.emit("volumeChanged", { volume: 40 });
      await bridge.idle();

      expect(server.reports()).toEqual([
        "POST /Sessions/Playing",
        "POST /Sessions/Playing/Progress",
        "POST /Sessions/Playing/Progress",
      ]);
    });

    it("reports stopped before started on a track change", async () => {
      engine.emit("stateChanged", { oldState: "playing", newState: "playing" });
      await bridge.idle();

      expect(server.reports()).toEqual(["POST /Sessions/Playing/Stopped", "POST /Sessions/Playing"]);
    });
  });

  describe("server commands", () => {
    beforeEach(async () => {
      await bridge.start();
    });

    it("routes each command type to the engine", async () => {
      channel.emit("playstate", { Command: "NextTrack" });
      channel.emit("generalCommand", { Name: "SetVolume", Arguments: { Volume: "70" } });
      channel.emit("play", { PlayCommand: "PlayNext", ItemIds: ["a"] });
      await bridge.idle();

      expect(engine.commands).toEqual(["next()", "setVolume(70)", "addTracks(jellyfin:track:a)"]);
    });

    it("keeps working after a command fails", async () => {
      vi.spyOn(engine, "next").mockRejectedValueOnce(new Error("engine refused"));

      channel.emit("playstate", { Command: "NextTrack" });
      channel.emit("playstate", { Command: "PreviousTrack" });
      await bridge.idle();

      expect(engine.commands).toEqual(["previous()"]);
    });
  });

  it("runs a notification only after the command queued before it finishes", async () => {
    bridge = createBridge({ seekSettleMs: 20 });
    await bridge.start();

    channel.emit("play", { PlayCommand: "PlayNow", ItemIds: ["a"], StartPositionTicks: 600_000_000 });
    engine.emit("volumeChanged", { volume: 50 });
    await bridge.idle();

    const progress = server.requests.find((r) => r.path === "/Sessions/Playing/Progress");
    expect(progress?.body).toMatchObject({ ItemId: "a", PositionTicks: 600_000_000, Volume: 50 });
  });

  describe("stop", () => {
    it("reports stopped and releases the channel and the engine", async () => {
      await bridge.start();
      await bridge.stop();

      expect(server.reports()).toEqual(["POST /Sessions/Playing/Stopped"]);
      expect(channel.stopped).toBe(1);
      expect(engine.commands).toEqual(["disconnect()"]);
      expect(bridge.isRunning).toBe(false);
    });

    it("stops listening to the engine and the channel", async () => {
      await bridge.start();
      await bridge.stop();

      engine.emit("stateChanged", { oldState: "stopped", newState: "playing" });
      channel.emit("playstate", { Command: "NextTrack" });
      await bridge.idle();

      expect(server.reports()).toEqual(["POST /Sessions/Playing/Stopped"]);
      expect(engine.commands).toEqual(["disconnect()"]);
      expect(engine.listenerCount("stateChanged")).toBe(0);
      expect(channel.listenerCount("playstate")).toBe(0);
    });

    it("waits for the running task before reporting stopped", async () => {
      bridge = createBridge({ seekSettleMs: 20 });
      await bridge.start();

      channel.emit("play", { PlayCommand: "PlayNow", ItemIds: ["a"], StartPositionTicks: 600_000_000 });
      engine.emit("volumeChanged", { volume: 50 });
      await bridge.stop();

      expect(engine.commands.slice(-2)).toEqual(["seek(60000)", "disconnect()"]);
      expect(server.reports()).toEqual(["POST /Sessions/Playing/Stopped"]);
    });

    it("sends the stop report after a heartbeat already in flight", async () => {
      engine.load(["jellyfin:track:X"]);
      engine.state = "playing";
      let release: () => void = () => {};
      vi.spyOn(engine, "getState").mockImplementationOnce(
        () =>
          new Promise((resolve) => {
            release = () => resolve("playing");
          }),
      );
      await bridge.start();

      const stopping = bridge.stop();
      release();
      await stopping;

      expect(server.reports()).toEqual(["POST /Sessions/Playing/Progress", "POST /Sessions/Playing/Stopped"]);
    });

    it("does nothing when the bridge never started", async () => {
      await bridge.stop();
      expect(server.requests).toEqual([]);
    });
  });
});

describe("SessionBridge.create", () => {
  let cacheDir: string;

  beforeEach(() => {
    cacheDir = mkdtempSync(join(tmpdir(), "bridge-test-"));
    vi.stubGlobal("fetch", createFakeServer().fetch);
  });

  afterEach(() => {
    rmSync(cacheDir, { recursive: true, force: true });
    vi.unstubAllGlobals();
  });

  it("normalizes the configured hostname", async () => {
    const config = loadConfig({ JELLYFIN_HOSTNAME: `${TEST_HOSTNAME}/`, JELLYFIN_TOKEN: "test-token" });

    const bridge = await SessionBridge.create({ ...config, cacheDir }, new FakeEngine());

    expect(bridge.hostname).toBe(TEST_HOSTNAME);
  });

  it("reads the token file when no token is configured", async () => {
    writeFileSync(join(cacheDir, "token"), "test-token\n");
    const config = loadConfig({ JELLYFIN_HOSTNAME: TEST_HOSTNAME, JELLYFIN_CACHE_DIR: cacheDir });

    await expect(SessionBridge.create(config, new FakeEngine())).resolves.toBeInstanceOf(SessionBridge);
  });

  it("fails without any token", async () => {
    const config = loadConfig({ JELLYFIN_HOSTNAME: TEST_HOSTNAME, JELLYFIN_CACHE_DIR: cacheDir });

    await expect(SessionBridge.create(config, new FakeEngine())).rejects.toBeInstanceOf(TokenNotFoundError);
  });
});

describe("package entry", () => {
  it("exports the bridge module rather than the service entry point", () => {
    const manifest: unknown = JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf-8"));

    expect(manifest).toMatchObject({
      types: "./src/session-bridge.ts",
      exports: { ".": "./src/session-bridge.ts" },
    });
  });
});
