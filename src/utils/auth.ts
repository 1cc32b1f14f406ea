import { createHash, randomBytes, randomUUID } from "node:crypto";
import { sign, verify } from "hono/jwt";
import type { JWTPayload } from "hono/utils/jwt/types";
import type { Credential } from "../types";

const OAUTH_STATE_TTL_SECONDS = 60 * 5; // 5 minutes
const DEFAULT_REFRESH_MARGIN_MS = 60 * 1000;
const PKCE_VERIFIER_BYTES = 64;

interface OAuthStatePayload extends JWTPayload {
  purpose: "spotify_oauth_state";
  nonce: string;
  exp: number;
}

/**
 * True when the credential expires within `marginMs` of `now`.
 */
export function isCredentialStale(
  credential: Credential,
  now: number = Date.now(),
  marginMs: number = DEFAULT_REFRESH_MARGIN_MS,
): boolean {
  return credential.expiresAt - marginMs <= now;
}

export function generateCodeVerifier(): string {
  return randomBytes(PKCE_VERIFIER_BYTES).toString("base64url");
}

export async function deriveCodeChallenge(verifier: string): Promise<string> {
  return createHash("sha256").update(verifier).digest("base64url");
}

export async function generateOAuthState(secret: string): Promise<string> {
  const now = Math.floor(Date.now() / 1000);
  const payload: OAuthStatePayload = {
    purpose: "spotify_oauth_state",
    nonce: randomUUID(),
    iat: now,
    exp: now + OAUTH_STATE_TTL_SECONDS,
  };

  return sign(payload, secret, "HS256");
}

export async function verifyOAuthState(
  secret: string,
  state: string,
): Promise<void> {
  const payload = await verify(state, secret, "HS256");

  if (payload.purpose !== "spotify_oauth_state" || typeof payload.nonce !== "string") {
    throw new Error("Invalid Spotify state token");
  }
}

export const tokenConstants = {
  OAUTH_STATE_TTL_SECONDS,
  DEFAULT_REFRESH_MARGIN_MS,
};
