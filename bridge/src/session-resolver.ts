/**
 * Looks up the server-side session for this device.
 *
 * Nothing is cached: the server may rotate session ids, so every caller
 * asks again.
 */
import { Logger } from "./logger.js";
import type { SessionClient } from "./session-client.js";
import { SessionListSchema, type SessionInfo } from "./types.js";

const log = new Logger("Session");

export class SessionResolver {
  constructor(
    private readonly client: SessionClient,
    private readonly deviceId: string,
  ) {}

  /** Id of this device's session, or null when the server has none (idle player). */
  async getSessionId(): Promise<string | null> {
    const session = await this.findSession();
    if (!session) {
      log.debug("Unable to find playback session on server");
      return null;
    }
    return session.Id;
  }

  /** Ids of the users attached to the session besides its owner. */
  async getSessionUserIds(): Promise<ReadonlySet<string>> {
    const session = await this.findSession();
    return new Set((session?.AdditionalUsers ?? []).map((user) => user.UserId));
  }

  private async findSession(): Promise<SessionInfo | null> {
    const sessions = await this.client.get(
      `/Sessions?DeviceId=${encodeURIComponent(this.deviceId)}`,
      SessionListSchema,
    );
    return sessions?.[0] ?? null;
  }
}
