/**
 * Applies remote commands to the local playback engine.
 *
 * Three message shapes arrive from the server socket: playstate (transport),
 * general commands (volume/mute) and play requests (queue management).
 * Commands the bridge does not know are ignored.
 */
import { Logger } from "./logger.js";
import type { PlaybackEngine } from "./playback-engine.js";
import { ticksToMs } from "./progress-payload.js";
import type { GeneralCommand, PlayRequest, PlaystateRequest } from "./types.js";

const log = new Logger("Commands");

/** Engine URI scheme/type for server items */
export const ITEM_URI_PREFIX = "jellyfin:track:";

export const VOLUME_STEP = 5;

export const DEFAULT_SEEK_SETTLE_MS = 500;

export function itemUri(itemId: string): string {
  return `${ITEM_URI_PREFIX}${itemId}`;
}

export interface CommandDispatcherOptions {
  /**
   * Wait after a play request before seeking to its start position.
   * A seek issued while the engine is still starting playback is lost.
   */
  readonly seekSettleMs?: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class CommandDispatcher {
  private readonly seekSettleMs: number;

  constructor(
    private readonly engine: PlaybackEngine,
    options: CommandDispatcherOptions = {},
  ) {
    this.seekSettleMs = options.seekSettleMs ?? DEFAULT_SEEK_SETTLE_MS;
  }

  async handlePlaystate(request: PlaystateRequest): Promise<void> {
    log.debug(`Playstate ${request.Command}`);

    switch (request.Command) {
      case "NextTrack":
        await this.engine.next();
        break;
      case "PreviousTrack":
        await this.engine.previous();
        break;
      case "PlayPause":
        if ((await this.engine.getState()) === "playing") {
          await this.engine.pause();
        } else {
          await this.engine.resume();
        }
        break;
      case "Pause":
        await this.engine.pause();
        break;
      case "Unpause":
        await this.engine.resume();
        break;
      case "Stop":
        await this.engine.stop();
        break;
      case "Seek":
        if (typeof request.SeekPositionTicks === "number") {
          await this.engine.seek(ticksToMs(request.SeekPositionTicks));
        }
        break;
      default:
        log.debug(`Ignoring unknown playstate command ${request.Command}`);
    }
  }

  async handleGeneralCommand(command: GeneralCommand): Promise<void> {
    log.debug(`General command ${command.Name}`);

    switch (command.Name) {
      case "SetVolume": {
        const volume = parseInt(String(command.Arguments?.Volume ?? ""), 10);
        if (!Number.isNaN(volume)) {
          await this.engine.setVolume(volume);
        }
        break;
      }
      case "VolumeUp":
      case "VolumeDown": {
        const current = await this.engine.getVolume();
        const step = command.Name === "VolumeDown" ? -VOLUME_STEP : VOLUME_STEP;
        await this.engine.setVolume(current + step);
        break;
      }
      case "ToggleMute":
        await this.engine.setMute(!(await this.engine.getMute()));
        break;
      case "Mute":
        await this.engine.setMute(true);
        break;
      case "Unmute":
        await this.engine.setMute(false);
        break;
      default:
        log.debug(`Ignoring unknown general command ${command.Name}`);
    }
  }

  async handlePlay(request: PlayRequest): Promise<void> {
    const uris = request.ItemIds.map(itemUri);
    log.info(`${request.PlayCommand || "Play"}: ${uris.length} item(s)`);

    switch (request.PlayCommand) {
      case "PlayNow": {
        await this.engine.clearTracklist();
        const added = await this.engine.addTracks(uris);
        const start = added[request.StartIndex ?? 0];
        if (start) {
          await this.engine.play(start.tlid);
        } else {
          log.warn(`Start index ${request.StartIndex ?? 0} outside ${added.length} added track(s)`);
        }
        break;
      }
      case "PlayLast": {
        // Jellyfin web's "Play next": insert right after the current track
        const index = await this.engine.getTracklistIndex();
        await this.engine.addTracks(uris, index === null ? 0 : index + 1);
        break;
      }
      case "PlayNext":
        // Jellyfin web's "Add to play queue"
        await this.engine.addTracks(uris);
        break;
      default:
        log.debug(`Ignoring unknown play command ${request.PlayCommand}`);
    }

    if (request.StartPositionTicks) {
      await sleep(this.seekSettleMs);
      await this.engine.seek(ticksToMs(request.StartPositionTicks));
    }
  }
}
