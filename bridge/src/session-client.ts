/**
 * HTTP client for the Jellyfin server.
 *
 * Features:
 *   - X-Emby-Authorization header on every request
 *   - AbortController timeouts on all fetch requests
 *   - zod validation of every JSON document read
 *   - Best-effort semantics: failures are logged and reported as null/false,
 *     never thrown, never retried
 */
import type { z } from "zod";

import { CLIENT_NAME, CLIENT_VERSION } from "./config.js";
import { describeError, Logger } from "./logger.js";
import { PublicSystemInfoSchema } from "./types.js";

const log = new Logger("Jellyfin");

const DEFAULT_TIMEOUT_MS = 10_000;

/** Path probed by the redirect check; public, needs no token */
export const PUBLIC_INFO_PATH = "/System/Info/Public";

export interface SessionClientOptions {
  /** Server base URL, already normalized */
  readonly hostname: string;
  readonly token: string;
  readonly deviceId: string;
  readonly deviceName: string;
  readonly timeoutMs?: number;
}

/** Strip whitespace and trailing slashes from a configured server URL. */
export function normalizeHostname(raw: string): string {
  return raw.trim().replace(/\/+$/, "");
}

/**
 * Make a fetch request with an AbortController timeout.
 */
async function fetchWithTimeout(
  url: string,
  options: RequestInit,
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url, { ...options, signal: controller.signal });
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Follow any redirect the server answers with and return the base URL it
 * lands on. Returns the input unchanged when the probe fails, lands
 * somewhere unrecognizable, or is not answered with server info.
 */
export async function checkRedirect(
  hostname: string,
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
): Promise<string> {
  try {
    const response = await fetchWithTimeout(
      `${hostname}${PUBLIC_INFO_PATH}`,
      { method: "GET", redirect: "follow" },
      timeoutMs,
    );
    if (!response.url) return hostname;

    const finalUrl = new URL(response.url);
    if (!finalUrl.pathname.endsWith(PUBLIC_INFO_PATH)) return hostname;

    const info = PublicSystemInfoSchema.safeParse(await response.json());
    if (!info.success) {
      log.warn(`${finalUrl.origin} did not answer as a Jellyfin server, keeping ${hostname}`);
      return hostname;
    }

    const basePath = finalUrl.pathname.slice(0, -PUBLIC_INFO_PATH.length);
    const resolved = normalizeHostname(`${finalUrl.origin}${basePath}`);
    if (resolved !== hostname) {
      log.info(`Server redirected ${hostname} → ${resolved}`);
    }
    return resolved;
  } catch (err) {
    log.warn(`Redirect check failed, keeping ${hostname}: ${describeError(err)}`);
    return hostname;
  }
}

export class SessionClient {
  readonly hostname: string;
  private readonly token: string;
  private readonly deviceId: string;
  private readonly deviceName: string;
  private readonly timeoutMs: number;

  constructor(options: SessionClientOptions) {
    this.hostname = options.hostname;
    this.token = options.token;
    this.deviceId = options.deviceId;
    this.deviceName = options.deviceName;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Build X-Emby-Authorization header value
   * Format: MediaBrowser Client="...", Device="...", DeviceId="...", Version="...", Token="..."
   */
  buildAuthHeader(): string {
    return `MediaBrowser Client="${CLIENT_NAME}", Device="${this.deviceName}", DeviceId="${this.deviceId}", Version="${CLIENT_VERSION}", Token="${this.token}"`;
  }

  /** GET a JSON document and validate it. Returns null on any failure. */
  async get<T>(path: string, schema: z.ZodType<T>): Promise<T | null> {
    try {
      const response = await fetchWithTimeout(
        `${this.hostname}${path}`,
        { method: "GET", headers: this.headers() },
        this.timeoutMs,
      );

      if (!response.ok) {
        const text = await response.text();
        throw new Error(`HTTP ${response.status}: ${text}`);
      }

      const parsed = schema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error(`Unexpected response shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
      }
      return parsed.data;
    } catch (err) {
      log.warn(`GET ${path} failed: ${describeError(err)}`);
      return null;
    }
  }

  /** POST an optional JSON body. Returns true if the server answered 2xx. */
  async post(path: string, body?: object): Promise<boolean> {
    try {
      const response = await fetchWithTimeout(
        `${this.hostname}${path}`,
        {
          method: "POST",
          headers: this.headers(),
          ...(body === undefined ? {} : { body: JSON.stringify(body) }),
        },
        this.timeoutMs,
      );

      if (!response.ok) {
        const text = await response.text();
        throw new Error(`HTTP ${response.status}: ${text}`);
      }

      log.debug(`POST ${path} succeeded`);
      return true;
    } catch (err) {
      log.error(`POST ${path} failed: ${describeError(err)}`);
      return false;
    }
  }

  private headers(): Record<string, string> {
    return {
      "Content-Type": "application/json",
      "X-Emby-Authorization": this.buildAuthHeader(),
    };
  }
}
