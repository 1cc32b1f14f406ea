import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Credential } from "../types";

export interface CredentialStorage {
  load(): Promise<Credential | null>;
  save(credential: Credential): Promise<void>;
  clear(): Promise<void>;
}

interface StoredCredential {
  access_token: string;
  refresh_token: string;
  expires_at: number;
}

function isStoredCredential(value: unknown): value is StoredCredential {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "access_token" in value &&
    typeof value.access_token === "string" &&
    "refresh_token" in value &&
    typeof value.refresh_token === "string" &&
    "expires_at" in value &&
    typeof value.expires_at === "number"
  );
}

/**
 * Keeps the credential as JSON in the per-user config directory.
 */
export class FileCredentialStorage implements CredentialStorage {
  constructor(private readonly path: string) {}

  async load(): Promise<Credential | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      console.warn(`Ignoring unreadable token cache at ${this.path}`, error);
      return null;
    }

    if (!isStoredCredential(parsed)) {
      console.warn(`Ignoring malformed token cache at ${this.path}`);
      return null;
    }

    return {
      accessToken: parsed.access_token,
      refreshToken: parsed.refresh_token,
      expiresAt: parsed.expires_at,
    };
  }

  async save(credential: Credential): Promise<void> {
    const record: StoredCredential = {
      access_token: credential.accessToken,
      refresh_token: credential.refreshToken,
      expires_at: credential.expiresAt,
    };
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, JSON.stringify(record, null, 2), {
      encoding: "utf8",
      mode: 0o600,
    });
  }

  async clear(): Promise<void> {
    await rm(this.path, { force: true });
  }
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
