import type {
  Paginated,
  SpotifyDevice,
  SpotifyDevicesResponse,
  SpotifyEpisode,
  SpotifyPlaybackState,
  SpotifyPlaylistTrack,
  SpotifySavedTrack,
  SpotifySearchResponse,
  SpotifySimplifiedPlaylist,
  SpotifyTokenResponse,
  SpotifyTrack,
} from "./spotify-types";
import type { PlayRequest, StreamingService } from "./StreamingService";
import type { ApiGateway } from "./ApiGateway";
import type {
  Credential,
  Device,
  LibraryItem,
  Page,
  PageRequest,
  PlaylistSummary,
  RemotePlayback,
} from "../types";
import { ApiError, AuthError } from "../utils/errors";

const SPOTIFY_AUTHORIZE_URL = "https://accounts.spotify.com/authorize";
const SPOTIFY_TOKEN_ENDPOINT = "https://accounts.spotify.com/api/token";
// Refreshes are single-flight, so a hung one would stall every caller
const TOKEN_REQUEST_TIMEOUT_MS = 10_000;
const DEFAULT_PAGE_LIMIT = 50;
const SEARCH_LIMIT = 20;

export const SPOTIFY_SCOPES = [
  "user-read-playback-state",
  "user-modify-playback-state",
  "user-read-currently-playing",
  "user-library-read",
  "user-library-modify",
  "playlist-read-private",
  "playlist-read-collaborative",
].join(" ");

export class SpotifyService implements StreamingService {
  constructor(private readonly gateway: ApiGateway) {}

  async getPlayback(): Promise<RemotePlayback | null> {
    const state = await this.gateway.request<SpotifyPlaybackState>({
      method: "GET",
      path: "/me/player",
      query: { additional_types: "episode" },
      idempotent: true,
    });
    return state ? toRemotePlayback(state) : null;
  }

  async play(request: PlayRequest = {}): Promise<void> {
    const body: Record<string, unknown> = {};
    if (request.uris) {
      body.uris = request.uris;
    }
    if (request.contextUri) {
      body.context_uri = request.contextUri;
      if (request.offset !== undefined) {
        body.offset = { position: request.offset };
      }
    }
    if (request.positionMs !== undefined) {
      body.position_ms = request.positionMs;
    }

    await this.gateway.request({
      method: "PUT",
      path: "/me/player/play",
      body: Object.keys(body).length > 0 ? body : undefined,
      idempotent: true,
    });
  }

  async pause(): Promise<void> {
    await this.gateway.request({
      method: "PUT",
      path: "/me/player/pause",
      idempotent: true,
    });
  }

  async next(): Promise<void> {
    await this.gateway.request({
      method: "POST",
      path: "/me/player/next",
      idempotent: false,
    });
  }

  async previous(): Promise<void> {
    await this.gateway.request({
      method: "POST",
      path: "/me/player/previous",
      idempotent: false,
    });
  }

  async seek(positionMs: number): Promise<void> {
    await this.gateway.request({
      method: "PUT",
      path: "/me/player/seek",
      query: { position_ms: Math.max(0, Math.round(positionMs)) },
      idempotent: true,
    });
  }

  async setVolume(percent: number): Promise<void> {
    await this.gateway.request({
      method: "PUT",
      path: "/me/player/volume",
      query: { volume_percent: clampPercent(percent) },
      idempotent: true,
    });
  }

  async transferPlayback(deviceId: string, play = false): Promise<void> {
    await this.gateway.request({
      method: "PUT",
      path: "/me/player",
      body: { device_ids: [deviceId], play },
      idempotent: true,
    });
  }

  async getDevices(): Promise<Device[]> {
    const response = await this.gateway.request<SpotifyDevicesResponse>({
      method: "GET",
      path: "/me/player/devices",
      idempotent: true,
    });
    return (response?.devices ?? [])
      .filter((device): device is SpotifyDevice & { id: string } =>
        device.id !== null,
      )
      .map((device) => ({
        id: device.id,
        name: device.name,
        type: device.type,
        isActive: device.is_active,
        volumePercent: device.volume_percent,
      }));
  }

  async searchTracks(query: string, limit = SEARCH_LIMIT): Promise<LibraryItem[]> {
    const response = await this.gateway.request<SpotifySearchResponse>({
      method: "GET",
      path: "/search",
      query: { q: query, type: "track", limit },
      idempotent: true,
    });
    return (response?.tracks?.items ?? []).flatMap((track) => {
      const item = toLibraryItem(track);
      return item ? [item] : [];
    });
  }

  async getLikedTracks(page: PageRequest = {}): Promise<Page<LibraryItem>> {
    const response = await this.gateway.request<Paginated<SpotifySavedTrack>>({
      method: "GET",
      path: "/me/tracks",
      query: pageQuery(page),
      idempotent: true,
    });
    return toPage(response, page, ({ track }) => {
      const item = toLibraryItem(track);
      return item ? { ...item, liked: true } : null;
    });
  }

  async saveTracks(trackIds: string[]): Promise<void> {
    await this.gateway.request({
      method: "PUT",
      path: "/me/tracks",
      body: { ids: trackIds },
      idempotent: true,
    });
  }

  async removeTracks(trackIds: string[]): Promise<void> {
    await this.gateway.request({
      method: "DELETE",
      path: "/me/tracks",
      body: { ids: trackIds },
      idempotent: true,
    });
  }

  async checkSavedTracks(trackIds: string[]): Promise<boolean[]> {
    if (trackIds.length === 0) {
      return [];
    }
    const flags = await this.gateway.request<boolean[]>({
      method: "GET",
      path: "/me/tracks/contains",
      query: { ids: trackIds.join(",") },
      idempotent: true,
    });
    return flags ?? trackIds.map(() => false);
  }

  async getPlaylists(page: PageRequest = {}): Promise<Page<PlaylistSummary>> {
    const response = await this.gateway.request<
      Paginated<SpotifySimplifiedPlaylist>
    >({
      method: "GET",
      path: "/me/playlists",
      query: pageQuery(page),
      idempotent: true,
    });
    return toPage(response, page, (playlist) => ({
      id: playlist.id,
      uri: playlist.uri,
      name: playlist.name,
      trackCount: playlist.tracks.total,
    }));
  }

  async getPlaylistTracks(
    playlistId: string,
    page: PageRequest = {},
  ): Promise<Page<LibraryItem>> {
    const response = await this.gateway.request<Paginated<SpotifyPlaylistTrack>>({
      method: "GET",
      path: `/playlists/${encodeURIComponent(playlistId)}/tracks`,
      query: pageQuery(page),
      idempotent: true,
    });
    // Episodes and removed tracks have no place in a track list
    return toPage(response, page, ({ track }) =>
      track && !isEpisode(track) ? toLibraryItem(track) : null,
    );
  }
}

function isEpisode(item: SpotifyTrack | SpotifyEpisode): item is SpotifyEpisode {
  return item.type === "episode";
}

function clampPercent(percent: number): number {
  return Math.min(100, Math.max(0, Math.round(percent)));
}

function pageQuery(page: PageRequest): Record<string, number> {
  return {
    limit: page.limit ?? DEFAULT_PAGE_LIMIT,
    offset: page.offset ?? 0,
  };
}

function toPage<T, U>(
  response: Paginated<T> | null,
  page: PageRequest,
  map: (item: T) => U | null,
): Page<U> {
  if (!response) {
    return {
      items: [],
      offset: page.offset ?? 0,
      limit: page.limit ?? DEFAULT_PAGE_LIMIT,
      total: 0,
    };
  }
  return {
    items: response.items.flatMap((item) => {
      const mapped = map(item);
      return mapped === null ? [] : [mapped];
    }),
    offset: response.offset,
    limit: response.limit,
    total: response.total,
  };
}

export function toLibraryItem(track: SpotifyTrack): LibraryItem | null {
  // Local files have no id and cannot be played or liked remotely
  if (!track.id) {
    return null;
  }
  return {
    id: track.id,
    uri: track.uri,
    title: track.name,
    artists: track.artists.map((a) => a.name),
    album: track.album.name,
    durationMs: track.duration_ms,
    liked: false,
  };
}

export function toRemotePlayback(state: SpotifyPlaybackState): RemotePlayback {
  const item = state.item;
  const device = {
    deviceId: state.device.id,
    deviceName: state.device.name,
    volumePercent: state.device.volume_percent,
  };

  if (!item) {
    return {
      isPlaying: state.is_playing,
      trackId: null,
      trackUri: null,
      title: null,
      artists: [],
      album: null,
      positionMs: state.progress_ms ?? 0,
      durationMs: 0,
      ...device,
    };
  }

  return {
    isPlaying: state.is_playing,
    trackId: item.id,
    trackUri: item.uri,
    title: item.name,
    artists: isEpisode(item)
      ? item.show
        ? [item.show.name]
        : []
      : item.artists.map((a) => a.name),
    album: isEpisode(item) ? null : item.album.name,
    positionMs: state.progress_ms ?? 0,
    durationMs: item.duration_ms,
    ...device,
  };
}

export function trackIdFromUri(uri: string): string {
  const parts = uri.split(":");
  return parts[parts.length - 1] ?? uri;
}

export function buildAuthorizeUrl(options: {
  clientId: string;
  redirectUri: string;
  state: string;
  codeChallenge: string;
  showDialog?: boolean;
}): string {
  const authorizeUrl = new URL(SPOTIFY_AUTHORIZE_URL);
  authorizeUrl.searchParams.set("client_id", options.clientId);
  authorizeUrl.searchParams.set("response_type", "code");
  authorizeUrl.searchParams.set("redirect_uri", options.redirectUri);
  authorizeUrl.searchParams.set("scope", SPOTIFY_SCOPES);
  authorizeUrl.searchParams.set("state", options.state);
  authorizeUrl.searchParams.set("code_challenge_method", "S256");
  authorizeUrl.searchParams.set("code_challenge", options.codeChallenge);
  if (options.showDialog) {
    authorizeUrl.searchParams.set("show_dialog", "true");
  }
  return authorizeUrl.toString();
}

async function requestSpotifyToken(
  params: URLSearchParams,
): Promise<SpotifyTokenResponse> {
  let response: Response;
  try {
    response = await fetch(SPOTIFY_TOKEN_ENDPOINT, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: params.toString(),
      signal: AbortSignal.timeout(TOKEN_REQUEST_TIMEOUT_MS),
    });
  } catch (error) {
    throw new ApiError("Unavailable", "Spotify token endpoint unreachable", {
      cause: error,
    });
  }

  if (!response.ok) {
    const errorBody = await response.text();
    // The accounts service answers 400 invalid_grant for revoked refresh tokens
    if (response.status === 400 || response.status === 401) {
      throw new AuthError(
        "RefreshDenied",
        `Spotify token request rejected (${response.status}): ${errorBody}`,
      );
    }
    throw new ApiError(
      response.status === 429 ? "RateLimited" : "Unavailable",
      `Spotify token request failed (${response.status}): ${errorBody}`,
      { status: response.status },
    );
  }

  return (await response.json()) as SpotifyTokenResponse;
}

function toCredential(
  tokenResponse: SpotifyTokenResponse,
  fallbackRefreshToken?: string,
): Credential {
  const refreshToken = tokenResponse.refresh_token ?? fallbackRefreshToken;
  if (!refreshToken) {
    throw new AuthError("NotAuthenticated", "Spotify did not issue a refresh token");
  }
  return {
    accessToken: tokenResponse.access_token,
    refreshToken,
    expiresAt: Date.now() + tokenResponse.expires_in * 1000,
  };
}

export async function exchangeSpotifyAuthorizationCode(options: {
  clientId: string;
  code: string;
  redirectUri: string;
  codeVerifier: string;
}): Promise<Credential> {
  const params = new URLSearchParams({
    grant_type: "authorization_code",
    code: options.code,
    redirect_uri: options.redirectUri,
    client_id: options.clientId,
    code_verifier: options.codeVerifier,
  });

  try {
    return toCredential(await requestSpotifyToken(params));
  } catch (error) {
    if (error instanceof AuthError) {
      throw new AuthError("NotAuthenticated", error.message);
    }
    throw error;
  }
}

export async function refreshSpotifyAccessToken(
  clientId: string,
  refreshToken: string,
): Promise<Credential> {
  const params = new URLSearchParams({
    grant_type: "refresh_token",
    refresh_token: refreshToken,
    client_id: clientId,
  });

  return toCredential(await requestSpotifyToken(params), refreshToken);
}
