/**
 * Attaches extra server users to this device's session, so plays are
 * recorded for all of them, then re-reads the session to confirm.
 */
import { Logger } from "./logger.js";
import type { SessionClient } from "./session-client.js";
import type { SessionResolver } from "./session-resolver.js";
import { UserListSchema } from "./types.js";

const log = new Logger("Users");

/** Outcome per username: attached and confirmed, unknown to the server, or not confirmed */
export type AttachOutcome = "added" | "missing" | "failed";

/** Split a comma-separated username list, dropping blanks. */
export function parseUsernames(list: string): string[] {
  return list
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

export class SessionUserManager {
  constructor(
    private readonly client: SessionClient,
    private readonly resolver: SessionResolver,
  ) {}

  /**
   * Map each username to its server user id (case-insensitive), or null
   * when the server has no such user.
   */
  async resolveUserIds(usernames: readonly string[]): Promise<Map<string, string | null>> {
    const users = (await this.client.get("/Users", UserListSchema)) ?? [];
    const idsByName = new Map(users.map((user) => [user.Name.toLowerCase(), user.Id]));
    return new Map(usernames.map((name) => [name, idsByName.get(name.toLowerCase()) ?? null]));
  }

  /**
   * Attach every user in a comma-separated list to the current session.
   * Returns an empty map when there is no session to attach to.
   */
  async addUsersToSession(usernameList: string): Promise<Map<string, AttachOutcome>> {
    const outcomes = new Map<string, AttachOutcome>();

    const sessionId = await this.resolver.getSessionId();
    if (!sessionId) {
      log.info("No active session, skipping additional users");
      return outcomes;
    }

    const users = await this.resolveUserIds(parseUsernames(usernameList));
    const resolved = new Map<string, string>();
    for (const [username, userId] of users) {
      if (!userId) {
        log.warn(`User ID not found for username: ${username}`);
        outcomes.set(username, "missing");
        continue;
      }
      resolved.set(username, userId);
      await this.client.post(
        `/Sessions/${encodeURIComponent(sessionId)}/User/${encodeURIComponent(userId)}`,
      );
    }

    const sessionUserIds = await this.resolver.getSessionUserIds();
    for (const [username, userId] of resolved) {
      if (sessionUserIds.has(userId)) {
        log.info(`Successfully added user ${username} to the session`);
        outcomes.set(username, "added");
      } else {
        log.warn(`Failed to add user ${username} to the session`);
        outcomes.set(username, "failed");
      }
    }

    return outcomes;
  }
}
