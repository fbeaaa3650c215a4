/**
 * Translates local playback notifications into session reports.
 *
 *   playing → playing   stop report, then start report (track boundary)
 *   * → playing|paused  start report with the current payload
 *   * → stopped         stop report
 *   seeked              progress report, PositionTicks + "TimeUpdate"
 *   volume changed      progress report, Volume + "VolumeChange"
 *
 * Pause and resume both send a start report: the protocol has no resume
 * call, IsPaused in the payload carries the difference.
 */
import { Logger } from "./logger.js";
import type { PlaybackEngine, PlaybackState } from "./playback-engine.js";
import { createProgressPayload, msToTicks } from "./progress-payload.js";
import type { SessionClient } from "./session-client.js";
import type { SessionResolver } from "./session-resolver.js";
import type { ProgressOverrides, ProgressUpdate } from "./types.js";

export const PLAYING_PATH = "/Sessions/Playing";
export const PROGRESS_PATH = "/Sessions/Playing/Progress";
export const STOPPED_PATH = "/Sessions/Playing/Stopped";

const log = new Logger("Reporter");

export class PlaybackReporter {
  constructor(
    private readonly engine: PlaybackEngine,
    private readonly client: SessionClient,
    private readonly resolver: SessionResolver,
  ) {}

  async onStateChanged(oldState: PlaybackState, newState: PlaybackState): Promise<void> {
    log.debug(`Playback state ${oldState} → ${newState}`);

    if (oldState === "playing" && newState === "playing") {
      // Two discrete plays for scrobbling, not one session spanning both tracks
      await this.reportStopped();
    }

    if (newState === "paused" || newState === "playing") {
      await this.reportStarted();
    } else if (newState === "stopped") {
      await this.reportStopped();
    }
  }

  async onSeeked(position: number): Promise<void> {
    await this.reportProgress({ PositionTicks: msToTicks(position), EventName: "TimeUpdate" });
  }

  async onVolumeChanged(volume: number): Promise<void> {
    await this.reportProgress({ Volume: volume, EventName: "VolumeChange" });
  }

  /** POST /Sessions/Playing with the current payload. Skipped when there is none. */
  async reportStarted(): Promise<boolean> {
    const payload = await createProgressPayload(this.engine, this.resolver);
    if (!payload) return false;

    log.info(`Playing ${payload.ItemId}${payload.IsPaused ? " (paused)" : ""}`);
    return this.client.post(PLAYING_PATH, payload);
  }

  /** POST /Sessions/Playing/Progress, with overrides laid over the current payload. */
  async reportProgress(overrides: ProgressOverrides = {}): Promise<boolean> {
    const payload = await createProgressPayload(this.engine, this.resolver);
    if (!payload) return false;

    const update: ProgressUpdate = { ...payload, ...overrides };
    return this.client.post(PROGRESS_PATH, update);
  }

  /** POST /Sessions/Playing/Stopped. Carries no body. */
  async reportStopped(): Promise<boolean> {
    log.info("Playback stopped");
    return this.client.post(STOPPED_PATH);
  }
}
