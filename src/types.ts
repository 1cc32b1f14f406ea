// Shared domain types

export interface Credential {
  accessToken: string;
  refreshToken: string;
  /** Epoch milliseconds */
  expiresAt: number;
}

/**
 * Point-in-time capture of remote playback. `positionMs` is only exact at
 * `capturedAt`; use `interpolatePosition` to render progress between polls.
 */
export interface PlaybackSnapshot {
  readonly isPlaying: boolean;
  readonly trackId: string | null;
  readonly trackUri: string | null;
  readonly title: string | null;
  readonly artists: readonly string[];
  readonly album: string | null;
  readonly positionMs: number;
  readonly durationMs: number;
  readonly deviceId: string | null;
  readonly deviceName: string | null;
  readonly volumePercent: number | null;
  readonly capturedAt: number;
}

/** Snapshot fields as reported by the service, before the tracker stamps them */
export type RemotePlayback = Omit<PlaybackSnapshot, "capturedAt">;

export interface LibraryItem {
  id: string;
  uri: string;
  title: string;
  artists: string[];
  album: string;
  durationMs: number;
  liked: boolean;
}

export interface PlaylistSummary {
  id: string;
  uri: string;
  name: string;
  trackCount: number;
}

export interface Device {
  id: string;
  name: string;
  type: string;
  isActive: boolean;
  volumePercent: number | null;
}

export interface Page<T> {
  items: T[];
  offset: number;
  limit: number;
  total: number;
}

export interface PageRequest {
  offset?: number;
  limit?: number;
}
