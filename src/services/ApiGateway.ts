import type { CredentialProvider } from "./TokenStore";
import type { SpotifyErrorBody } from "./spotify-types";
import { ApiError } from "../utils/errors";
import { sleep } from "../utils/time";

export type HttpMethod = "GET" | "PUT" | "POST" | "DELETE";

export interface ApiRequest {
  method: HttpMethod;
  /** Path below the API base, e.g. `/me/player` */
  path: string;
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
  /**
   * Whether repeating the request is harmless. Non-idempotent requests are
   * never retried once their outcome is unknown.
   */
  idempotent: boolean;
}

export interface GatewayOptions {
  baseUrl?: string;
  timeoutMs?: number;
  maxAttempts?: number;
  backoffBaseMs?: number;
  backoffFactor?: number;
  defaultRetryAfterMs?: number;
}

const DEFAULT_OPTIONS: Required<GatewayOptions> = {
  baseUrl: "https://api.spotify.com/v1",
  timeoutMs: 8000,
  maxAttempts: 3,
  backoffBaseMs: 250,
  backoffFactor: 2,
  defaultRetryAfterMs: 1000,
};

// A gateway timing out upstream may still have applied the request
const AMBIGUOUS_STATUSES = new Set([502, 504]);

export class ApiGateway {
  private readonly options: Required<GatewayOptions>;

  constructor(
    private readonly tokens: CredentialProvider,
    options: GatewayOptions = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  // Wrapper for global fetch to allow for easier mocking in tests
  _fetch(url: string, options?: RequestInit): Promise<Response> {
    return fetch(url, options);
  }

  async request<T>(req: ApiRequest): Promise<T | null> {
    const url = this.buildUrl(req);
    let rateLimited = false;
    let reauthorized = false;
    let failures = 0;

    for (;;) {
      const credential = await this.tokens.getValidCredential();

      let response: Response;
      try {
        response = await this._fetch(url, {
          method: req.method,
          headers: {
            Authorization: `Bearer ${credential.accessToken}`,
            ...(req.body !== undefined
              ? { "Content-Type": "application/json" }
              : {}),
          },
          body: req.body !== undefined ? JSON.stringify(req.body) : undefined,
          signal: AbortSignal.timeout(this.options.timeoutMs),
        });
      } catch (error) {
        if (!req.idempotent) {
          throw new ApiError(
            "Ambiguous",
            `${req.method} ${req.path} did not complete; outcome unknown`,
            { cause: error },
          );
        }
        failures++;
        if (failures >= this.options.maxAttempts) {
          throw new ApiError(
            "Unavailable",
            `${req.method} ${req.path} failed after ${failures} attempts`,
            { cause: error },
          );
        }
        await this.backoff(req, failures, "connection failure");
        continue;
      }

      if (response.status === 429) {
        const retryAfterMs = this.retryAfterMs(response);
        await discardBody(response);
        if (rateLimited) {
          throw new ApiError("RateLimited", `Rate limited on ${req.path}`, {
            status: 429,
            retryAfterMs,
          });
        }
        rateLimited = true;
        console.warn(`Rate limited on ${req.path}, retrying in ${retryAfterMs}ms`);
        await sleep(retryAfterMs);
        continue;
      }

      if (response.status === 401) {
        await discardBody(response);
        if (reauthorized) {
          throw new ApiError("Unauthorized", `Unauthorized on ${req.path}`, {
            status: 401,
          });
        }
        reauthorized = true;
        await this.tokens.forceRefresh();
        continue;
      }

      if (response.status >= 500) {
        await discardBody(response);
        if (!req.idempotent && AMBIGUOUS_STATUSES.has(response.status)) {
          throw new ApiError(
            "Ambiguous",
            `${req.method} ${req.path} returned ${response.status}; outcome unknown`,
            { status: response.status },
          );
        }
        failures++;
        if (failures >= this.options.maxAttempts) {
          throw new ApiError(
            "Unavailable",
            `${req.method} ${req.path} returned ${response.status} after ${failures} attempts`,
            { status: response.status },
          );
        }
        await this.backoff(req, failures, `HTTP ${response.status}`);
        continue;
      }

      if (!response.ok) {
        const message = await readErrorMessage(response);
        if (response.status === 404 && req.path.startsWith("/me/player")) {
          throw new ApiError("NoActiveDevice", message || "No active device", {
            status: 404,
          });
        }
        throw new ApiError(
          "Rejected",
          `${req.method} ${req.path} failed (${response.status}): ${message}`,
          { status: response.status },
        );
      }

      if (response.status === 204) {
        return null;
      }
      const text = await response.text();
      if (!text) {
        return null;
      }
      return JSON.parse(text) as T;
    }
  }

  private buildUrl(req: ApiRequest): string {
    const url = new URL(`${this.options.baseUrl}${req.path}`);
    for (const [key, value] of Object.entries(req.query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private retryAfterMs(response: Response): number {
    const retryAfter = response.headers.get("Retry-After");
    if (retryAfter) {
      const seconds = parseInt(retryAfter, 10);
      if (!Number.isNaN(seconds) && seconds >= 0) {
        return seconds * 1000;
      }
    }
    return this.options.defaultRetryAfterMs;
  }

  private async backoff(
    req: ApiRequest,
    failures: number,
    reason: string,
  ): Promise<void> {
    const delayMs =
      this.options.backoffBaseMs * this.options.backoffFactor ** (failures - 1);
    console.warn(
      `${req.method} ${req.path}: ${reason}, retry ${failures} in ${delayMs}ms`,
    );
    await sleep(delayMs);
  }
}

async function readErrorMessage(response: Response): Promise<string> {
  const text = await response.text().catch(() => "");
  if (!text) {
    return response.statusText;
  }
  try {
    const body = JSON.parse(text) as SpotifyErrorBody;
    if (typeof body.error === "object" && body.error !== null) {
      return body.error.message;
    }
    return body.error_description ?? body.error ?? text;
  } catch {
    return text;
  }
}

// Releases the connection of a response that is about to be retried or dropped
async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel();
}
