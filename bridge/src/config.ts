/**
 * Bridge configuration from environment variables.
 */
import { homedir, hostname } from "os";
import { join } from "path";

import { Logger, parseLogLevel, type LogLevel } from "./logger.js";

const log = new Logger("Config");

export interface BridgeConfig {
  /** Jellyfin server base URL */
  readonly hostname: string;
  /** Auth token; empty means "read the token file from cacheDir" */
  readonly token: string;
  /** Directory holding the `token` file written by the login helper */
  readonly cacheDir: string;
  /** Device id this player registers its session under */
  readonly deviceId: string;
  /** Device name shown in the server dashboard */
  readonly deviceName: string;
  /** Comma-separated usernames to attach to the session at startup */
  readonly additionalUsers: string;
  /** Mopidy JSON-RPC WebSocket endpoint */
  readonly mopidyUrl: string;
  /** Seconds between heartbeat progress reports */
  readonly heartbeatIntervalSeconds: number;
  /** Milliseconds to wait after a queue command before seeking to its start position */
  readonly seekSettleMs: number;
  /** Per-request HTTP timeout */
  readonly requestTimeoutMs: number;
  readonly logLevel: LogLevel;
}

export const CLIENT_NAME = "Jellyfin Playback Bridge";
export const CLIENT_VERSION = "1.0.0";

/** Read configuration from an environment map. Values are not validated here. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const host = hostname();
  return {
    hostname: env.JELLYFIN_HOSTNAME || "",
    token: env.JELLYFIN_TOKEN || "",
    cacheDir: env.JELLYFIN_CACHE_DIR || join(homedir(), ".cache", "jellyfin-bridge"),
    deviceId: env.JELLYFIN_DEVICE_ID || `jellyfin-bridge-${host}`,
    deviceName: env.JELLYFIN_DEVICE_NAME || host,
    additionalUsers: env.JELLYFIN_ADDITIONAL_USERS || "",
    mopidyUrl: env.MOPIDY_URL || "ws://localhost:6680/mopidy/ws",
    heartbeatIntervalSeconds: parseInt(env.HEARTBEAT_INTERVAL_SECONDS || "60", 10),
    seekSettleMs: parseInt(env.SEEK_SETTLE_MS || "500", 10),
    requestTimeoutMs: parseInt(env.REQUEST_TIMEOUT_MS || "10000", 10),
    logLevel: parseLogLevel(env.LOG_LEVEL) ?? "info",
  };
}

export const config: BridgeConfig = loadConfig();

/**
 * Validate configuration at startup.
 * Throws if required values are missing or numeric values are out of range.
 * Warns about plain HTTP to a remote server, since the token travels in a header.
 */
export function validateConfig(cfg: BridgeConfig = config): void {
  if (!cfg.hostname) {
    throw new Error("JELLYFIN_HOSTNAME is required, e.g. https://jellyfin.example.org");
  }

  let url: URL;
  try {
    url = new URL(cfg.hostname);
  } catch {
    throw new Error(`JELLYFIN_HOSTNAME is not a valid URL: ${cfg.hostname}`);
  }

  if (!cfg.deviceId) {
    throw new Error("JELLYFIN_DEVICE_ID must not be empty");
  }
  if (Number.isNaN(cfg.heartbeatIntervalSeconds) || cfg.heartbeatIntervalSeconds <= 0) {
    throw new Error("HEARTBEAT_INTERVAL_SECONDS must be a positive number");
  }
  if (Number.isNaN(cfg.seekSettleMs) || cfg.seekSettleMs < 0) {
    throw new Error("SEEK_SETTLE_MS must be a non-negative number");
  }
  if (Number.isNaN(cfg.requestTimeoutMs) || cfg.requestTimeoutMs <= 0) {
    throw new Error("REQUEST_TIMEOUT_MS must be a positive number");
  }

  const isLocalhost = ["localhost", "127.0.0.1", "[::1]"].includes(url.hostname);
  if (url.protocol === "http:" && !isLocalhost) {
    log.warn(
      "Using HTTP with a remote server. Consider HTTPS so the access token is not sent in clear text."
    );
  }
}
