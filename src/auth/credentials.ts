import crypto from "node:crypto";
import fs from "node:fs/promises";
import bcrypt from "bcryptjs";
import type { Logger } from "../config/logger";

export interface CredentialStore {
  verify(username: string, password: string): Promise<boolean>;
}

export type HtpasswdHashFormat = "bcrypt" | "sha1" | "plain" | "unsupported";

export function parseHtpasswd(source: string): Map<string, string> {
  const entries = new Map<string, string>();
  for (const rawLine of source.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;
    const separator = line.indexOf(":");
    if (separator <= 0) continue;
    entries.set(line.slice(0, separator), line.slice(separator + 1));
  }
  return entries;
}

export function detectHashFormat(hash: string): HtpasswdHashFormat {
  if (/^\$2[aby]\$\d{2}\$/.test(hash)) return "bcrypt";
  if (hash.startsWith("{SHA}")) return "sha1";
  // apr1, md5-crypt, sha-crypt and legacy DES crypt are not supported.
  if (hash.startsWith("$") || /^[./0-9A-Za-z]{13}$/.test(hash)) return "unsupported";
  return "plain";
}

function constantTimeEquals(left: string, right: string): boolean {
  const a = Buffer.from(left, "utf8");
  const b = Buffer.from(right, "utf8");
  if (a.length !== b.length) return false;
  return crypto.timingSafeEqual(a, b);
}

export async function verifyHtpasswdHash(password: string, hash: string): Promise<boolean> {
  switch (detectHashFormat(hash)) {
    case "bcrypt":
      return bcrypt.compare(password, hash.replace(/^\$2y\$/, "$2b$"));
    case "sha1": {
      const digest = crypto.createHash("sha1").update(password, "utf8").digest("base64");
      return constantTimeEquals(`{SHA}${digest}`, hash);
    }
    case "plain":
      return constantTimeEquals(password, hash);
    case "unsupported":
      return false;
  }
}

/** Re-reads the file on every check so edits apply without a restart. */
export function createHtpasswdCredentialStore(filePath: string, logger: Logger): CredentialStore {
  return {
    verify: async (username, password) => {
      const entries = parseHtpasswd(await fs.readFile(filePath, "utf8"));
      const hash = entries.get(username);
      if (hash === undefined) return false;
      if (detectHashFormat(hash) === "unsupported") {
        logger.warn("htpasswd_unsupported_hash_format", { username, file: filePath });
        return false;
      }
      return verifyHtpasswdHash(password, hash);
    },
  };
}
