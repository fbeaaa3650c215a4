/**
 * Jellyfin wire types and the zod schemas that validate inbound documents.
 */
import { z } from "zod";

/** Entry of the now-playing queue reported to the server */
export interface QueueEntry {
  readonly Id: string;
  readonly PlaylistItemId: string;
}

/** Body of POST /Sessions/Playing and POST /Sessions/Playing/Progress */
export interface ProgressPayload {
  readonly VolumeLevel: number;
  readonly IsMuted: boolean;
  readonly IsPaused: boolean;
  readonly RepeatMode: "RepeatNone";
  readonly PositionTicks: number;
  readonly PlayMethod: "DirectPlay";
  readonly PlaySessionId: string;
  readonly MediaSourceId: string;
  readonly CanSeek: true;
  readonly ItemId: string;
  readonly NowPlayingQueue: readonly QueueEntry[];
  readonly PlaylistItemId: string;
}

export type ProgressEventName = "TimeUpdate" | "VolumeChange";

/** Fields a targeted progress update lays over a fresh payload */
export interface ProgressOverrides {
  readonly PositionTicks?: number;
  readonly Volume?: number;
  readonly EventName?: ProgressEventName;
}

export type ProgressUpdate = ProgressPayload & ProgressOverrides;

// --- Documents read over HTTP ---

export const SessionUserSchema = z.object({
  UserId: z.string(),
  UserName: z.string().optional(),
});

export const SessionSchema = z.object({
  Id: z.string(),
  DeviceId: z.string().optional(),
  AdditionalUsers: z.array(SessionUserSchema).optional(),
});

export const SessionListSchema = z.array(SessionSchema);

export type SessionInfo = z.infer<typeof SessionSchema>;

export const UserSchema = z.object({
  Id: z.string(),
  Name: z.string(),
});

export const UserListSchema = z.array(UserSchema);

/** Body of the unauthenticated /System/Info/Public endpoint */
export const PublicSystemInfoSchema = z.object({
  Id: z.string(),
  ServerName: z.string().optional(),
  Version: z.string().optional(),
});

// --- Messages received over the /socket channel ---

export const SocketMessageSchema = z.object({
  MessageType: z.string(),
  MessageId: z.string().optional(),
  Data: z.unknown().optional(),
});

export type SocketMessage = z.infer<typeof SocketMessageSchema>;

/** Playstate command: transport control */
export const PlaystateRequestSchema = z.object({
  Command: z.string(),
  SeekPositionTicks: z.number().nullish(),
});

export type PlaystateRequest = z.infer<typeof PlaystateRequestSchema>;

/** General command: volume and mute control. Argument values arrive as strings. */
export const GeneralCommandSchema = z.object({
  Name: z.string(),
  Arguments: z.record(z.string(), z.unknown()).nullish(),
});

export type GeneralCommand = z.infer<typeof GeneralCommandSchema>;

/** "Play to" request: queue management */
export const PlayRequestSchema = z.object({
  ItemIds: z.array(z.string()),
  PlayCommand: z.string().default(""),
  StartIndex: z.number().int().nullish(),
  StartPositionTicks: z.number().nullish(),
});

export type PlayRequest = z.infer<typeof PlayRequestSchema>;
