/**
 * Access token resolution.
 *
 * The token comes from configuration when set; otherwise from the `token`
 * file a separate login step leaves in the cache directory.
 */
import { existsSync, readFileSync } from "fs";
import { join } from "path";

export const TOKEN_FILE_NAME = "token";

export class TokenNotFoundError extends Error {
  constructor(readonly tokenPath: string) {
    super(`No authentication token found (checked configuration and ${tokenPath})`);
    this.name = "TokenNotFoundError";
  }
}

/** Path of the persisted token inside a cache directory. */
export function tokenFilePath(cacheDir: string): string {
  return join(cacheDir, TOKEN_FILE_NAME);
}

/**
 * Return the configured token, or the contents of the token file.
 * Throws TokenNotFoundError when neither yields a token.
 */
export function resolveToken(configuredToken: string, cacheDir: string): string {
  const configured = configuredToken.trim();
  if (configured) return configured;

  const path = tokenFilePath(cacheDir);
  if (!existsSync(path)) {
    throw new TokenNotFoundError(path);
  }

  const token = readFileSync(path, "utf-8").trim();
  if (!token) {
    throw new TokenNotFoundError(path);
  }
  return token;
}
