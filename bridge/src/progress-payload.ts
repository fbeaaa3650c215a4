/**
 * Progress payload construction.
 *
 * buildProgressPayload is a pure function of a playback snapshot and a
 * session id; readPlaybackSnapshot and createProgressPayload do the engine
 * and server reads that feed it.
 */
import type { PlaybackEngine, PlaybackState, TrackRef } from "./playback-engine.js";
import type { SessionResolver } from "./session-resolver.js";
import type { ProgressPayload, QueueEntry } from "./types.js";

/** The server rejects queues of 1000+ entries; stay under with some margin */
export const MAX_QUEUE_ENTRIES = 950;

/** Milliseconds → 100-nanosecond ticks */
export const TICKS_PER_MS = 10_000;

/** Local playback state at one instant */
export interface PlaybackSnapshot {
  readonly currentTrack: TrackRef | null;
  readonly mute: boolean;
  readonly volume: number;
  /** Milliseconds */
  readonly position: number;
  readonly state: PlaybackState;
  readonly tracklistIndex: number | null;
  readonly tracklist: readonly TrackRef[];
}

export function msToTicks(ms: number): number {
  return ms * TICKS_PER_MS;
}

export function ticksToMs(ticks: number): number {
  return Math.trunc(ticks / TICKS_PER_MS);
}

/** Item id from an engine URI: `jellyfin:track:abc` → `abc` */
export function itemIdFromUri(uri: string): string {
  const segments = uri.split(":");
  return segments[segments.length - 1] ?? uri;
}

export function playlistItemId(index: number | null): string {
  return `playlistItem${index ?? "None"}`;
}

/** Queue entries for a tracklist, in order, capped at MAX_QUEUE_ENTRIES */
export function buildNowPlayingQueue(tracklist: readonly TrackRef[]): QueueEntry[] {
  return tracklist.slice(0, MAX_QUEUE_ENTRIES).map((track, index) => ({
    Id: itemIdFromUri(track.uri),
    PlaylistItemId: playlistItemId(index),
  }));
}

/**
 * Build the progress document for a snapshot.
 * Returns null when there is no session or nothing is current.
 */
export function buildProgressPayload(
  snapshot: PlaybackSnapshot,
  sessionId: string | null,
): ProgressPayload | null {
  if (!sessionId || !snapshot.currentTrack) return null;

  const itemId = itemIdFromUri(snapshot.currentTrack.uri);
  return {
    VolumeLevel: snapshot.volume,
    IsMuted: snapshot.mute,
    IsPaused: snapshot.state === "paused",
    RepeatMode: "RepeatNone",
    PositionTicks: msToTicks(snapshot.position),
    PlayMethod: "DirectPlay",
    PlaySessionId: sessionId,
    MediaSourceId: itemId,
    CanSeek: true,
    ItemId: itemId,
    NowPlayingQueue: buildNowPlayingQueue(snapshot.tracklist),
    PlaylistItemId: playlistItemId(snapshot.tracklistIndex),
  };
}

/**
 * Read everything a payload needs from the engine, one query at a time.
 * Returns null without further queries when nothing is current.
 */
export async function readPlaybackSnapshot(engine: PlaybackEngine): Promise<PlaybackSnapshot | null> {
  const currentTrack = await engine.getCurrentTrack();
  if (!currentTrack) return null;

  const mute = await engine.getMute();
  const volume = await engine.getVolume();
  const position = await engine.getTimePosition();
  const state = await engine.getState();
  const tracklistIndex = await engine.getTracklistIndex();
  const tracklist = await engine.getTracks();

  return { currentTrack, mute, volume, position, state, tracklistIndex, tracklist };
}

/** Resolve the session, read the engine, build. Null means "do not report". */
export async function createProgressPayload(
  engine: PlaybackEngine,
  resolver: SessionResolver,
): Promise<ProgressPayload | null> {
  const sessionId = await resolver.getSessionId();
  if (!sessionId) return null;

  const snapshot = await readPlaybackSnapshot(engine);
  if (!snapshot) return null;

  return buildProgressPayload(snapshot, sessionId);
}
