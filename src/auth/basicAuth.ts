import type { Logger } from "../config/logger";
import { HttpError } from "../http/errors";
import type { CredentialStore } from "./credentials";

export const AUTH_REALM = "cloudomate";
export const BASIC_CHALLENGE = `Basic realm=${AUTH_REALM}`;

export type AuthContext = {
  username: string;
  password: string;
};

export type AuthOutcome = { authenticated: true; username: string | null };

export function parseBasicAuthorization(header: string | undefined): AuthContext | null {
  if (!header) return null;
  const match = header.match(/^Basic\s+(\S+)\s*$/);
  if (!match || !match[1]) return null;
  const decoded = Buffer.from(match[1], "base64").toString("utf8");
  const separator = decoded.indexOf(":");
  if (separator === -1) return null;
  return {
    username: decoded.slice(0, separator),
    password: decoded.slice(separator + 1),
  };
}

function challenge(message: string): HttpError {
  return new HttpError(401, "Unauthenticated", message, { "www-authenticate": BASIC_CHALLENGE });
}

/**
 * Checks HTTP Basic credentials for one request. Without a store every request passes.
 * Throws a 401 carrying the Basic challenge otherwise.
 */
export async function authenticateRequest(
  authorizationHeader: string | undefined,
  store: CredentialStore | null,
  logger: Logger
): Promise<AuthOutcome> {
  if (!store) return { authenticated: true, username: null };

  const credentials = parseBasicAuthorization(authorizationHeader);
  if (!credentials) {
    throw challenge("Authentication required");
  }

  let verified: boolean;
  try {
    verified = await store.verify(credentials.username, credentials.password);
  } catch (error) {
    logger.error("credential_store_failed", {
      username: credentials.username,
      message: error instanceof Error ? error.message : String(error),
    });
    throw new HttpError(500, "Internal", "Credential store unavailable");
  }

  if (!verified) {
    logger.warn("auth_rejected", { username: credentials.username });
    throw challenge("Invalid credentials");
  }
  return { authenticated: true, username: credentials.username };
}
