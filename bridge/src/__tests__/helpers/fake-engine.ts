/**
 * In-memory PlaybackEngine for tests.
 *
 * Holds a tracklist, mixer and transport state, and records every command
 * it receives in `commands` as "name(arg, ...)" strings.
 */
import { EventEmitter } from "events";

import type {
  PlaybackEngine,
  PlaybackState,
  TrackRef,
  TracklistEntry,
} from "../../playback-engine.js";

export class FakeEngine extends EventEmitter implements PlaybackEngine {
  state: PlaybackState = "stopped";
  volume = 50;
  mute = false;
  position = 0;
  entries: TracklistEntry[] = [];
  currentIndex: number | null = null;
  connected = false;
  readonly commands: string[] = [];
  private nextTlid = 1;

  get isConnected(): boolean {
    return this.connected;
  }

  /** Replace the tracklist with tracks for the given URIs; the first becomes current. */
  load(uris: readonly string[], currentIndex: number | null = uris.length > 0 ? 0 : null): void {
    this.entries = uris.map((uri) => ({ tlid: this.nextTlid++, track: { uri } }));
    this.currentIndex = currentIndex;
  }

  async connect(): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    this.commands.push("disconnect()");
  }

  async getCurrentTrack(): Promise<TrackRef | null> {
    if (this.currentIndex === null) return null;
    return this.entries[this.currentIndex]?.track ?? null;
  }

  async getMute(): Promise<boolean> {
    return this.mute;
  }

  async getVolume(): Promise<number> {
    return this.volume;
  }

  async getTimePosition(): Promise<number> {
    return this.position;
  }

  async getState(): Promise<PlaybackState> {
    return this.state;
  }

  async getTracklistIndex(): Promise<number | null> {
    return this.currentIndex;
  }

  async getTracks(): Promise<readonly TrackRef[]> {
    return this.entries.map((entry) => entry.track);
  }

  async next(): Promise<void> {
    this.commands.push("next()");
  }

  async previous(): Promise<void> {
    this.commands.push("previous()");
  }

  async pause(): Promise<void> {
    this.commands.push("pause()");
    this.state = "paused";
  }

  async resume(): Promise<void> {
    this.commands.push("resume()");
    this.state = "playing";
  }

  async stop(): Promise<void> {
    this.commands.push("stop()");
    this.state = "stopped";
  }

  async seek(position: number): Promise<void> {
    this.commands.push(`seek(${position})`);
    this.position = position;
  }

  async setVolume(volume: number): Promise<void> {
    this.commands.push(`setVolume(${volume})`);
    this.volume = volume;
  }

  async setMute(mute: boolean): Promise<void> {
    this.commands.push(`setMute(${mute})`);
    this.mute = mute;
  }

  async clearTracklist(): Promise<void> {
    this.commands.push("clearTracklist()");
    this.entries = [];
    this.currentIndex = null;
  }

  async addTracks(uris: readonly string[], atPosition?: number): Promise<readonly TracklistEntry[]> {
    this.commands.push(
      atPosition === undefined ? `addTracks(${uris.join(",")})` : `addTracks(${uris.join(",")}@${atPosition})`,
    );
    const added = uris.map((uri) => ({ tlid: this.nextTlid++, track: { uri } }));
    const at = atPosition ?? this.entries.length;
    this.entries.splice(at, 0, ...added);
    return added;
  }

  async play(tlid?: number): Promise<void> {
    this.commands.push(tlid === undefined ? "play()" : `play(${tlid})`);
    if (tlid !== undefined) {
      const index = this.entries.findIndex((entry) => entry.tlid === tlid);
      this.currentIndex = index === -1 ? null : index;
    }
    this.state = "playing";
  }
}
