/**
 * Inbound command channel: the Jellyfin `/socket` WebSocket.
 *
 * Opening the socket with this device's id is also what registers the
 * session on the server. The channel answers the server's keep-alive
 * requirement and re-emits the three command messages the bridge acts on:
 *
 *   'playstate'      - PlaystateRequest   (transport control)
 *   'generalCommand' - GeneralCommand     (volume, mute)
 *   'play'           - PlayRequest        (queue management)
 *   'connection'     - { connected }
 *
 * Listeners are called synchronously from the socket's message handler, so
 * they must hand work off rather than await it.
 */
import { EventEmitter } from "events";

import WebSocket from "ws";
import type { z } from "zod";

import { describeError, Logger } from "./logger.js";
import {
  GeneralCommandSchema,
  PlayRequestSchema,
  PlaystateRequestSchema,
  SocketMessageSchema,
  type SocketMessage,
} from "./types.js";

/** Auto-reconnect backoff constants */
const RECONNECT_INITIAL_MS = 2000;
const RECONNECT_MAX_MS = 30_000;
const RECONNECT_MULTIPLIER = 2;

export interface SessionSocketOptions {
  readonly hostname: string;
  readonly token: string;
  readonly deviceId: string;
}

/** Build the socket URL from the HTTP base URL (http → ws, https → wss). */
export function buildSocketUrl(options: SessionSocketOptions): string {
  const url = new URL(`${options.hostname}/socket`);
  url.protocol = url.protocol === "https:" ? "wss:" : "ws:";
  url.searchParams.set("api_key", options.token);
  url.searchParams.set("deviceId", options.deviceId);
  return url.toString();
}

const COMMAND_EVENTS: Readonly<Record<string, { event: string; schema: z.ZodTypeAny }>> = {
  Playstate: { event: "playstate", schema: PlaystateRequestSchema },
  GeneralCommand: { event: "generalCommand", schema: GeneralCommandSchema },
  Play: { event: "play", schema: PlayRequestSchema },
};

export class SessionSocket extends EventEmitter {
  private readonly log = new Logger("Socket");
  private readonly url: string;
  private socket: WebSocket | null = null;
  private running = false;
  private keepAliveTimer: ReturnType<typeof setInterval> | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private reconnectAttempt = 0;

  constructor(options: SessionSocketOptions) {
    super();
    this.url = buildSocketUrl(options);
  }

  get isRunning(): boolean {
    return this.running;
  }

  get isConnected(): boolean {
    return this.socket !== null && this.socket.readyState === WebSocket.OPEN;
  }

  /** Open the channel. A failed first attempt is retried in the background. */
  start(): void {
    if (this.running) {
      throw new Error("Session socket is already running");
    }
    this.running = true;
    this.reconnectAttempt = 0;
    this.open();
  }

  stop(): void {
    if (!this.running) return;

    this.running = false;
    this.cancelReconnect();
    this.stopKeepAlive();
    const socket = this.socket;
    this.socket = null;
    socket?.removeAllListeners();
    socket?.close();
  }

  private open(): void {
    const socket = new WebSocket(this.url);
    this.socket = socket;

    socket.on("open", () => {
      this.reconnectAttempt = 0;
      this.log.info("Connected to server socket");
      this.emit("connection", { connected: true });
    });

    socket.on("message", (data: WebSocket.RawData) => {
      this.handleMessage(data.toString());
    });

    socket.on("error", (err: Error) => {
      this.log.warn(`Socket error: ${err.message}`);
    });

    socket.on("close", (code: number) => {
      if (this.socket !== socket) return;
      this.socket = null;
      this.stopKeepAlive();
      this.log.warn(`Server socket closed (code ${code})`);
      this.emit("connection", { connected: false });
      this.scheduleReconnect();
    });
  }

  /** Parse and route one inbound frame. */
  handleMessage(raw: string): void {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.log.warn("Dropping non-JSON socket frame");
      return;
    }

    const envelope = SocketMessageSchema.safeParse(json);
    if (!envelope.success) {
      this.log.warn("Dropping socket frame without MessageType");
      return;
    }

    this.route(envelope.data);
  }

  private route(message: SocketMessage): void {
    if (message.MessageType === "ForceKeepAlive") {
      const seconds = typeof message.Data === "number" ? message.Data : 60;
      this.startKeepAlive(seconds);
      return;
    }
    if (message.MessageType === "KeepAlive") return;

    const command = COMMAND_EVENTS[message.MessageType];
    if (!command) {
      this.log.debug(`Ignoring ${message.MessageType} message`);
      return;
    }

    const parsed = command.schema.safeParse(message.Data);
    if (!parsed.success) {
      this.log.warn(`Malformed ${message.MessageType} message: ${parsed.error.issues[0]?.message ?? "invalid"}`);
      return;
    }
    this.emit(command.event, parsed.data);
  }

  private send(message: SocketMessage): void {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) return;
    socket.send(JSON.stringify(message), (err) => {
      if (err) this.log.warn(`Socket send failed: ${describeError(err)}`);
    });
  }

  // --- Keep-alive ---

  /** The server drops sessions that stay silent for `seconds`; ping at half that. */
  private startKeepAlive(seconds: number): void {
    this.stopKeepAlive();
    const intervalMs = Math.max(1, seconds / 2) * 1000;
    this.send({ MessageType: "KeepAlive" });
    this.keepAliveTimer = setInterval(() => this.send({ MessageType: "KeepAlive" }), intervalMs);
  }

  private stopKeepAlive(): void {
    if (this.keepAliveTimer !== null) {
      clearInterval(this.keepAliveTimer);
      this.keepAliveTimer = null;
    }
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
      if (this.running) this.open();
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
