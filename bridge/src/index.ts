/**
 * Jellyfin Playback Bridge
 *
 * Reports Mopidy playback to a Jellyfin server as a remote-controllable
 * session, and applies the server's remote-control commands to Mopidy.
 *
 * Environment variables:
 *   JELLYFIN_HOSTNAME           - Server URL (required)
 *   JELLYFIN_TOKEN              - Access token (default: read <cache dir>/token)
 *   JELLYFIN_CACHE_DIR          - Directory holding the token file
 *   JELLYFIN_DEVICE_ID          - Device id of this player's session
 *   JELLYFIN_DEVICE_NAME        - Device name shown on the server
 *   JELLYFIN_ADDITIONAL_USERS   - Comma-separated users to attach to the session
 *   MOPIDY_URL                  - Mopidy JSON-RPC WebSocket (default: ws://localhost:6680/mopidy/ws)
 *   HEARTBEAT_INTERVAL_SECONDS  - Progress heartbeat period (default: 60)
 *   SEEK_SETTLE_MS              - Delay before seeking after a play request (default: 500)
 *   REQUEST_TIMEOUT_MS          - HTTP timeout (default: 10000)
 *   LOG_LEVEL                   - debug | info | warn | error (default: info)
 */
import { config, validateConfig } from "./config.js";
import { MopidyEngine } from "./engines/mopidy-engine.js";
import { describeError, Logger, setMinLogLevel } from "./logger.js";
import { SessionBridge } from "./session-bridge.js";

const log = new Logger("Main");

async function main(): Promise<void> {
  setMinLogLevel(config.logLevel);
  log.info("Jellyfin Playback Bridge starting...");

  validateConfig(config);
  log.info(`Server: ${config.hostname}`);
  log.info(`Device ID: ${config.deviceId}`);
  log.info(`Mopidy: ${config.mopidyUrl}`);
  log.info(`Heartbeat: ${config.heartbeatIntervalSeconds}s`);
  log.info(`Seek settle: ${config.seekSettleMs}ms`);

  const engine = new MopidyEngine({ url: config.mopidyUrl, rpcTimeoutMs: config.requestTimeoutMs });
  engine.on("connection", ({ connected }: { connected: boolean }) => {
    log.info(`Mopidy ${connected ? "connected" : "disconnected"}`);
  });

  const bridge = await SessionBridge.create(config, engine);

  // Graceful shutdown handlers
  const shutdown = async (signal: string): Promise<void> => {
    log.info(`Received ${signal}, shutting down...`);
    await bridge.stop();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  await bridge.start();
  log.info(`Bridge running against ${bridge.hostname}`);
}

main().catch((err: unknown) => {
  log.error(`Fatal error: ${describeError(err)}`);
  process.exit(1);
});
