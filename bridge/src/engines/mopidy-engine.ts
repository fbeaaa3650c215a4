/**
 * Mopidy Playback Engine
 *
 * Talks to a Mopidy server through its JSON-RPC 2.0 WebSocket endpoint
 * (`ws://host:6680/mopidy/ws`). The same socket carries request/response
 * pairs and core event notifications; the latter are mapped onto the
 * PlaybackEngine events.
 *
 * Reconnects with exponential backoff when the socket drops while running.
 */
import { EventEmitter } from "events";

import WebSocket from "ws";
import { z } from "zod";

import { describeError, Logger } from "../logger.js";
import {
  isPlaybackState,
  type PlaybackEngine,
  type PlaybackEngineEventMap,
  type PlaybackState,
  type TrackRef,
  type TracklistEntry,
} from "../playback-engine.js";

const DEFAULT_RPC_TIMEOUT_MS = 10_000;

/** Auto-reconnect backoff constants */
const RECONNECT_INITIAL_MS = 2000;
const RECONNECT_MAX_MS = 30_000;
const RECONNECT_MULTIPLIER = 2;

const TrackModelSchema = z.object({
  uri: z.string(),
  name: z.string().optional(),
});

const TlTrackSchema = z.object({
  tlid: z.number().int(),
  track: TrackModelSchema,
});

const RpcResponseSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.number(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

const CoreEventSchema = z.discriminatedUnion("event", [
  z.object({
    event: z.literal("playback_state_changed"),
    old_state: z.string(),
    new_state: z.string(),
  }),
  z.object({ event: z.literal("seeked"), time_position: z.number() }),
  z.object({ event: z.literal("volume_changed"), volume: z.number() }),
]);

const NullableTrackSchema = TrackModelSchema.nullable();
const TrackListSchema = z.array(TrackModelSchema);
const TlTrackListSchema = z.array(TlTrackSchema);
const NullableIndexSchema = z.number().int().nullable();
const NullableNumberSchema = z.number().nullable();
const MuteSchema = z.boolean().nullable();
const StateSchema = z.string();
const AnySchema = z.unknown();

interface PendingCall {
  readonly method: string;
  readonly resolve: (value: unknown) => void;
  readonly reject: (reason: Error) => void;
  readonly timer: ReturnType<typeof setTimeout>;
}

export interface MopidyEngineOptions {
  /** JSON-RPC WebSocket URL */
  readonly url: string;
  readonly rpcTimeoutMs?: number;
}

/**
 * Events emitted:
 *   'stateChanged'  - { oldState, newState }
 *   'seeked'        - { position } in milliseconds
 *   'volumeChanged' - { volume }
 *   'connection'    - { connected }
 */
export class MopidyEngine extends EventEmitter implements PlaybackEngine {
  private readonly log = new Logger("Mopidy");
  private readonly url: string;
  private readonly rpcTimeoutMs: number;
  private readonly pending = new Map<number, PendingCall>();
  private socket: WebSocket | null = null;
  /** Socket still in its handshake, not yet usable for calls */
  private connecting: WebSocket | null = null;
  private nextId = 0;
  private running = false;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private reconnectAttempt = 0;

  constructor(options: MopidyEngineOptions) {
    super();
    this.url = options.url;
    this.rpcTimeoutMs = options.rpcTimeoutMs ?? DEFAULT_RPC_TIMEOUT_MS;
  }

  get isConnected(): boolean {
    return this.socket !== null && this.socket.readyState === WebSocket.OPEN;
  }

  async connect(): Promise<void> {
    if (this.running) {
      throw new Error("Mopidy engine is already connected");
    }
    this.running = true;
    this.reconnectAttempt = 0;
    try {
      await this.open();
    } catch (err) {
      this.running = false;
      throw err;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    this.cancelReconnect();
    this.failPending(new Error("Mopidy engine disconnected"));
    const connecting = this.connecting;
    this.connecting = null;
    connecting?.close();
    const socket = this.socket;
    this.socket = null;
    socket?.removeAllListeners();
    socket?.close();
  }

  // --- Queries ---

  async getCurrentTrack(): Promise<TrackRef | null> {
    return this.call("core.playback.get_current_track", {}, NullableTrackSchema);
  }

  async getMute(): Promise<boolean> {
    return (await this.call("core.mixer.get_mute", {}, MuteSchema)) ?? false;
  }

  async getVolume(): Promise<number> {
    return (await this.call("core.mixer.get_volume", {}, NullableNumberSchema)) ?? 0;
  }

  async getTimePosition(): Promise<number> {
    return (await this.call("core.playback.get_time_position", {}, NullableNumberSchema)) ?? 0;
  }

  async getState(): Promise<PlaybackState> {
    const state = await this.call("core.playback.get_state", {}, StateSchema);
    if (!isPlaybackState(state)) {
      throw new Error(`Unexpected playback state from Mopidy: ${state}`);
    }
    return state;
  }

  async getTracklistIndex(): Promise<number | null> {
    return this.call("core.tracklist.index", {}, NullableIndexSchema);
  }

  async getTracks(): Promise<readonly TrackRef[]> {
    return this.call("core.tracklist.get_tracks", {}, TrackListSchema);
  }

  // --- Commands ---

  async next(): Promise<void> {
    await this.call("core.playback.next", {}, AnySchema);
  }

  async previous(): Promise<void> {
    await this.call("core.playback.previous", {}, AnySchema);
  }

  async pause(): Promise<void> {
    await this.call("core.playback.pause", {}, AnySchema);
  }

  async resume(): Promise<void> {
    await this.call("core.playback.resume", {}, AnySchema);
  }

  async stop(): Promise<void> {
    await this.call("core.playback.stop", {}, AnySchema);
  }

  async seek(position: number): Promise<void> {
    await this.call("core.playback.seek", { time_position: position }, AnySchema);
  }

  async setVolume(volume: number): Promise<void> {
    await this.call("core.mixer.set_volume", { volume }, AnySchema);
  }

  async setMute(mute: boolean): Promise<void> {
    await this.call("core.mixer.set_mute", { mute }, AnySchema);
  }

  async clearTracklist(): Promise<void> {
    await this.call("core.tracklist.clear", {}, AnySchema);
  }

  async addTracks(uris: readonly string[], atPosition?: number): Promise<readonly TracklistEntry[]> {
    const params: Record<string, unknown> = { uris: [...uris] };
    if (atPosition !== undefined) {
      params.at_position = atPosition;
    }
    return this.call("core.tracklist.add", params, TlTrackListSchema);
  }

  async play(tlid?: number): Promise<void> {
    await this.call("core.playback.play", tlid === undefined ? {} : { tlid }, AnySchema);
  }

  // --- Transport ---

  private open(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const socket = new WebSocket(this.url);
      this.connecting = socket;
      let opened = false;

      socket.on("open", () => {
        if (this.connecting === socket) this.connecting = null;
        if (!this.running) {
          socket.close();
          reject(new Error("Mopidy engine disconnected"));
          return;
        }
        opened = true;
        this.socket = socket;
        this.reconnectAttempt = 0;
        this.log.info("Connected", { url: this.url });
        this.emitEvent("connection", { connected: true });
        resolve();
      });

      socket.on("message", (data: WebSocket.RawData) => {
        this.handleMessage(data.toString());
      });

      socket.on("error", (err: Error) => {
        this.log.warn(`Socket error: ${err.message}`);
        if (!opened) reject(err);
      });

      socket.on("close", () => {
        if (this.connecting === socket) this.connecting = null;
        if (this.socket === socket) {
          this.socket = null;
        }
        this.failPending(new Error("Mopidy socket closed"));
        if (opened) {
          this.log.warn("Connection closed");
          this.emitEvent("connection", { connected: false });
          this.scheduleReconnect();
        } else {
          reject(new Error(`Could not connect to Mopidy at ${this.url}`));
        }
      });
    });
  }

  private call<T>(method: string, params: Record<string, unknown>, schema: z.ZodType<T>): Promise<T> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error(`Mopidy not connected (${method})`));
    }

    const id = ++this.nextId;
    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new Error(`Mopidy call ${method} timed out after ${this.rpcTimeoutMs}ms`));
      }, this.rpcTimeoutMs);

      this.pending.set(id, { method, resolve, reject, timer });
      socket.send(JSON.stringify({ jsonrpc: "2.0", id, method, params }), (err) => {
        if (!err) return;
        clearTimeout(timer);
        this.pending.delete(id);
        reject(err);
      });
    }).then((result) => schema.parse(result));
  }

  /** Route one inbound frame: a response to a pending call, or a core event. */
  handleMessage(raw: string): void {
    let message: unknown;
    try {
      message = JSON.parse(raw);
    } catch {
      this.log.warn("Dropping non-JSON frame");
      return;
    }

    const response = RpcResponseSchema.safeParse(message);
    if (response.success) {
      this.settle(response.data);
      return;
    }

    const event = CoreEventSchema.safeParse(message);
    if (!event.success) return; // other core events are not used

    switch (event.data.event) {
      case "playback_state_changed": {
        const { old_state: oldState, new_state: newState } = event.data;
        if (isPlaybackState(oldState) && isPlaybackState(newState)) {
          this.emitEvent("stateChanged", { oldState, newState });
        }
        break;
      }
      case "seeked":
        this.emitEvent("seeked", { position: event.data.time_position });
        break;
      case "volume_changed":
        this.emitEvent("volumeChanged", { volume: event.data.volume });
        break;
    }
  }

  private emitEvent<K extends keyof PlaybackEngineEventMap>(event: K, payload: PlaybackEngineEventMap[K]): void {
    this.emit(event, payload);
  }

  private settle(response: z.infer<typeof RpcResponseSchema>): void {
    const call = this.pending.get(response.id);
    if (!call) return;

    this.pending.delete(response.id);
    clearTimeout(call.timer);
    if (response.error) {
      call.reject(new Error(`Mopidy call ${call.method} failed: ${response.error.message}`));
    } else {
      call.resolve(response.result ?? null);
    }
  }

  private failPending(reason: Error): void {
    for (const call of this.pending.values()) {
      clearTimeout(call.timer);
      call.reject(reason);
    }
    this.pending.clear();
  }

  // --- Auto-reconnect ---

  private scheduleReconnect(): void {
    if (!this.running || this.reconnectTimer !== null) return;

    this.reconnectAttempt++;
    const delay = Math.min(
      RECONNECT_INITIAL_MS * Math.pow(RECONNECT_MULTIPLIER, this.reconnectAttempt - 1),
      RECONNECT_MAX_MS,
    );
    this.log.info(`Reconnecting in ${(delay / 1000).toFixed(0)}s (attempt ${this.reconnectAttempt})`);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.open().catch((err: unknown) => {
        this.log.warn(`Reconnect failed: ${describeError(err)}`);
        this.scheduleReconnect();
      });
    }, delay);
  }

  private cancelReconnect(): void {
    if (this.reconnectTimer !== null) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.reconnectAttempt = 0;
  }
}
