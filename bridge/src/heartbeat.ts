/**
 * Periodic progress report while something is playing or paused.
 *
 * Runs on its own timer, outside the bridge's worker queue, so a long
 * worker task never delays it. The timer is unref'd: it never keeps the
 * process alive on its own.
 */
import { describeError, Logger } from "./logger.js";
import type { PlaybackEngine } from "./playback-engine.js";
import type { PlaybackReporter } from "./playback-reporter.js";

const log = new Logger("Heartbeat");

export class Heartbeat {
  private timer: ReturnType<typeof setInterval> | null = null;
  private current: Promise<boolean> | null = null;

  constructor(
    private readonly engine: PlaybackEngine,
    private readonly reporter: PlaybackReporter,
    private readonly intervalMs: number,
  ) {}

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /** Tick once now, then every intervalMs. */
  start(): void {
    if (this.timer !== null) {
      throw new Error("Heartbeat is already running");
    }
    this.timer = setInterval(() => void this.tick(), this.intervalMs);
    this.timer.unref();
    void this.tick();
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** One heartbeat. Resolves true if a progress report was sent. */
  async tick(): Promise<boolean> {
    if (this.current !== null) {
      log.debug("Previous heartbeat still running, skipping");
      return false;
    }

    const run = this.report();
    this.current = run;
    try {
      return await run;
    } finally {
      this.current = null;
    }
  }

  /** Resolves once the heartbeat in flight, if any, has finished. */
  async settled(): Promise<void> {
    await this.current;
  }

  private async report(): Promise<boolean> {
    try {
      const state = await this.engine.getState();
      if (state !== "playing" && state !== "paused") return false;
      return await this.reporter.reportProgress();
    } catch (err) {
      log.warn(`Heartbeat failed: ${describeError(err)}`);
      return false;
    }
  }
}
