import type { Credential } from "../types";
import type { CredentialStorage } from "../db/credentials";
import { AuthError, describeError } from "../utils/errors";
import { isCredentialStale, tokenConstants } from "../utils/auth";

export type TokenRefresher = (refreshToken: string) => Promise<Credential>;

/**
 * What the API gateway needs from the token store.
 */
export interface CredentialProvider {
  getValidCredential(): Promise<Credential>;
  forceRefresh(): Promise<Credential>;
}

export interface TokenStoreOptions {
  refreshMarginMs?: number;
}

type RevokedListener = (error: AuthError) => void;

export class TokenStore implements CredentialProvider {
  private credential: Credential | null = null;
  private refreshing: Promise<Credential> | null = null;
  private revoked = false;
  private readonly refreshMarginMs: number;
  private readonly revokedListeners = new Set<RevokedListener>();

  constructor(
    private readonly storage: CredentialStorage,
    private readonly refresher: TokenRefresher,
    options: TokenStoreOptions = {},
  ) {
    this.refreshMarginMs =
      options.refreshMarginMs ?? tokenConstants.DEFAULT_REFRESH_MARGIN_MS;
  }

  /**
   * Reads the persisted credential, if any. Returns it even when stale; the
   * next `getValidCredential` refreshes it.
   */
  async load(): Promise<Credential | null> {
    this.credential = await this.storage.load();
    return this.credential;
  }

  /** Installs a credential from a completed authorization and persists it. */
  async authorize(credential: Credential): Promise<void> {
    await this.storage.save(credential);
    this.credential = credential;
    this.revoked = false;
  }

  onRevoked(listener: RevokedListener): () => void {
    this.revokedListeners.add(listener);
    return () => this.revokedListeners.delete(listener);
  }

  async getValidCredential(): Promise<Credential> {
    const credential = this.current();
    if (!isCredentialStale(credential, Date.now(), this.refreshMarginMs)) {
      return credential;
    }
    return this.refresh(credential);
  }

  async forceRefresh(): Promise<Credential> {
    return this.refresh(this.current());
  }

  private current(): Credential {
    if (this.revoked) {
      throw new AuthError("RefreshDenied", "Session revoked, sign in again");
    }
    if (!this.credential) {
      throw new AuthError("NotAuthenticated", "No stored Spotify credential");
    }
    return this.credential;
  }

  private refresh(credential: Credential): Promise<Credential> {
    // A second caller joins the refresh that is already running
    if (this.refreshing) {
      return this.refreshing;
    }

    this.refreshing = (async () => {
      try {
        const next = await this.refresher(credential.refreshToken);
        // The old refresh token may already be rotated out
        this.credential = next;
        try {
          await this.storage.save(next);
        } catch (saveError) {
          console.error("Failed to persist refreshed credential:", describeError(saveError));
        }
        return next;
      } catch (error) {
        if (error instanceof AuthError && error.reason === "RefreshDenied") {
          await this.revoke(error);
        }
        throw error;
      } finally {
        this.refreshing = null;
      }
    })();

    return this.refreshing;
  }

  private async revoke(error: AuthError): Promise<void> {
    this.revoked = true;
    this.credential = null;
    // The next start has to go through the browser again
    try {
      await this.storage.clear();
    } catch (clearError) {
      console.error("Failed to clear revoked credential:", describeError(clearError));
    }
    for (const listener of this.revokedListeners) listener(error);
  }
}
