/**
 * SessionBridge: wires the playback engine and the server together.
 *
 * Engine notifications and server commands go through one serial worker
 * (a p-queue with concurrency 1) so they run one at a time in arrival order.
 * Producers only enqueue; they never wait for the worker. The heartbeat
 * runs on its own timer beside the queue.
 */
import type { EventEmitter } from "events";

import PQueue from "p-queue";

import { CommandDispatcher } from "./command-dispatcher.js";
import type { BridgeConfig } from "./config.js";
import { Heartbeat } from "./heartbeat.js";
import { describeError, Logger } from "./logger.js";
import type { PlaybackEngine, PlaybackEngineEventMap } from "./playback-engine.js";
import { PlaybackReporter } from "./playback-reporter.js";
import { checkRedirect, normalizeHostname, SessionClient } from "./session-client.js";
import { SessionResolver } from "./session-resolver.js";
import { SessionSocket } from "./session-socket.js";
import { SessionUserManager, type AttachOutcome } from "./session-users.js";
import { resolveToken } from "./token.js";
import type { GeneralCommand, PlayRequest, PlaystateRequest } from "./types.js";

const log = new Logger("Bridge");

/** Events a command channel emits, with their payloads */
export interface CommandChannelEventMap {
  playstate: PlaystateRequest;
  generalCommand: GeneralCommand;
  play: PlayRequest;
}

/** Source of server commands: emits the events in CommandChannelEventMap */
export interface CommandChannel extends EventEmitter {
  start(): void;
  stop(): void;
}

export interface SessionBridgeDeps {
  readonly engine: PlaybackEngine;
  readonly client: SessionClient;
  readonly channel: CommandChannel;
  readonly deviceId: string;
  /** Comma-separated usernames to attach at start; empty for none */
  readonly additionalUsers: string;
  readonly heartbeatIntervalMs: number;
  readonly seekSettleMs: number;
}

export class SessionBridge {
  private readonly engine: PlaybackEngine;
  private readonly client: SessionClient;
  private readonly channel: CommandChannel;
  private readonly additionalUsers: string;
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly resolver: SessionResolver;
  private readonly reporter: PlaybackReporter;
  private readonly dispatcher: CommandDispatcher;
  private readonly users: SessionUserManager;
  private readonly heartbeat: Heartbeat;
  private readonly detachers: Array<() => void> = [];
  private running = false;

  /**
   * Build a bridge from configuration: resolve the token (throws
   * TokenNotFoundError when there is none), normalize the hostname and
   * follow the server's redirect once.
   */
  static async create(config: BridgeConfig, engine: PlaybackEngine): Promise<SessionBridge> {
    const token = resolveToken(config.token, config.cacheDir);
    const hostname = await checkRedirect(normalizeHostname(config.hostname), config.requestTimeoutMs);

    const client = new SessionClient({
      hostname,
      token,
      deviceId: config.deviceId,
      deviceName: config.deviceName,
      timeoutMs: config.requestTimeoutMs,
    });
    const channel = new SessionSocket({ hostname, token, deviceId: config.deviceId });

    return new SessionBridge({
      engine,
      client,
      channel,
      deviceId: config.deviceId,
      additionalUsers: config.additionalUsers,
      heartbeatIntervalMs: config.heartbeatIntervalSeconds * 1000,
      seekSettleMs: config.seekSettleMs,
    });
  }

  constructor(deps: SessionBridgeDeps) {
    this.engine = deps.engine;
    this.client = deps.client;
    this.channel = deps.channel;
    this.additionalUsers = deps.additionalUsers;
    this.resolver = new SessionResolver(deps.client, deps.deviceId);
    this.reporter = new PlaybackReporter(deps.engine, deps.client, this.resolver);
    this.dispatcher = new CommandDispatcher(deps.engine, { seekSettleMs: deps.seekSettleMs });
    this.users = new SessionUserManager(deps.client, this.resolver);
    this.heartbeat = new Heartbeat(deps.engine, this.reporter, deps.heartbeatIntervalMs);
  }

  get isRunning(): boolean {
    return this.running;
  }

  get hostname(): string {
    return this.client.hostname;
  }

  async start(): Promise<void> {
    if (this.running) {
      throw new Error("SessionBridge is already running");
    }

    log.info(`Starting bridge for ${this.client.hostname}`);
    await this.engine.connect();
    this.running = true;
    this.wireEngineEvents();
    this.wireChannelEvents();
    this.channel.start();
    this.heartbeat.start();

    if (this.additionalUsers.trim()) {
      const list = this.additionalUsers;
      this.enqueue("addUsers", async () => {
        await this.users.addUsersToSession(list);
      });
    }
  }

  /** Report playback stopped, then release the server channel and the engine. */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    for (const detach of this.detachers.splice(0)) detach();
    this.queue.clear();
    this.heartbeat.stop();

    // Stop report goes out after the running task and heartbeat
    await Promise.all([this.queue.onIdle(), this.heartbeat.settled()]);
    await this.reporter.reportStopped();
    this.channel.stop();
    try {
      await this.engine.disconnect();
    } catch (err) {
      log.warn(`Engine disconnect failed: ${describeError(err)}`);
    }
    log.info("Bridge stopped");
  }

  /** Attach users to the current session now, outside the startup sequence. */
  attachUsers(usernameList: string): Promise<Map<string, AttachOutcome>> {
    return this.users.addUsersToSession(usernameList);
  }

  /** Resolves once every queued task has finished. */
  idle(): Promise<void> {
    return this.queue.onIdle();
  }

  private wireEngineEvents(): void {
    this.onEngine("stateChanged", (event) => {
      this.enqueue("stateChanged", () => this.reporter.onStateChanged(event.oldState, event.newState));
    });

    this.onEngine("seeked", (event) => {
      this.enqueue("seeked", () => this.reporter.onSeeked(event.position));
    });

    this.onEngine("volumeChanged", (event) => {
      this.enqueue("volumeChanged", () => this.reporter.onVolumeChanged(event.volume));
    });
  }

  private wireChannelEvents(): void {
    this.onChannel("playstate", (request) => {
      this.enqueue("playstate", () => this.dispatcher.handlePlaystate(request));
    });

    this.onChannel("generalCommand", (command) => {
      this.enqueue("generalCommand", () => this.dispatcher.handleGeneralCommand(command));
    });

    this.onChannel("play", (request) => {
      this.enqueue("play", () => this.dispatcher.handlePlay(request));
    });
  }

  private onEngine<K extends keyof PlaybackEngineEventMap>(
    event: K,
    listener: (payload: PlaybackEngineEventMap[K]) => void,
  ): void {
    this.listen(this.engine, event, listener);
  }

  private onChannel<K extends keyof CommandChannelEventMap>(
    event: K,
    listener: (payload: CommandChannelEventMap[K]) => void,
  ): void {
    this.listen(this.channel, event, listener);
  }

  /** Subscribe, remembering how to unsubscribe on stop. */
  private listen<T>(emitter: EventEmitter, event: string, listener: (payload: T) => void): void {
    emitter.on(event, listener);
    this.detachers.push(() => emitter.off(event, listener));
  }

  /** Queue a task on the serial worker. A failing task is logged; the queue moves on. */
  private enqueue(label: string, task: () => Promise<unknown>): void {
    void this.queue.add(async () => {
      try {
        await task();
      } catch (err) {
        log.error(`${label} failed: ${describeError(err)}`);
      }
    });
  }
}
