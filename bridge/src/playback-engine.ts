/**
 * Contract between the bridge and the local playback engine.
 *
 * An engine extends EventEmitter and emits the events in
 * PlaybackEngineEventMap. Queries and commands return promises; the bridge
 * awaits each one in turn so a worker task sees a consistent sequence of reads.
 */
import { EventEmitter } from "events";

export type PlaybackState = "playing" | "paused" | "stopped";

/** A track as the engine knows it */
export interface TrackRef {
  /** Engine URI, `scheme:type:id` */
  readonly uri: string;
  readonly name?: string;
}

/** A track's slot in the engine's tracklist */
export interface TracklistEntry {
  /** Tracklist id, unique per slot */
  readonly tlid: number;
  readonly track: TrackRef;
}

export interface StateChangedEvent {
  readonly oldState: PlaybackState;
  readonly newState: PlaybackState;
}

export interface SeekedEvent {
  /** New position in milliseconds */
  readonly position: number;
}

export interface VolumeChangedEvent {
  readonly volume: number;
}

export interface PlaybackEngineEventMap {
  stateChanged: StateChangedEvent;
  seeked: SeekedEvent;
  volumeChanged: VolumeChangedEvent;
  connection: { readonly connected: boolean };
}

export interface PlaybackEngine extends EventEmitter {
  readonly isConnected: boolean;

  connect(): Promise<void>;
  disconnect(): Promise<void>;

  // Queries
  getCurrentTrack(): Promise<TrackRef | null>;
  getMute(): Promise<boolean>;
  getVolume(): Promise<number>;
  /** Play position in milliseconds */
  getTimePosition(): Promise<number>;
  getState(): Promise<PlaybackState>;
  /** Index of the current track in the tracklist, null when nothing is current */
  getTracklistIndex(): Promise<number | null>;
  getTracks(): Promise<readonly TrackRef[]>;

  // Commands
  next(): Promise<void>;
  previous(): Promise<void>;
  pause(): Promise<void>;
  resume(): Promise<void>;
  stop(): Promise<void>;
  /** Seek to a position in milliseconds */
  seek(position: number): Promise<void>;
  setVolume(volume: number): Promise<void>;
  setMute(mute: boolean): Promise<void>;
  clearTracklist(): Promise<void>;
  /** Add tracks by URI, appended or inserted at a tracklist position */
  addTracks(uris: readonly string[], atPosition?: number): Promise<readonly TracklistEntry[]>;
  play(tlid?: number): Promise<void>;
}

export function isPlaybackState(value: unknown): value is PlaybackState {
  return value === "playing" || value === "paused" || value === "stopped";
}
