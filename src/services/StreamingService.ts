import type {
  Device,
  LibraryItem,
  Page,
  PageRequest,
  PlaylistSummary,
  RemotePlayback,
} from "../types";

export interface PlayRequest {
  /** Track URIs to play, in order */
  uris?: string[];
  /** Album, artist or playlist URI to play from */
  contextUri?: string;
  /** Zero-based position within the context */
  offset?: number;
  positionMs?: number;
}

/**
 * Playback control surface the engine depends on
 */
export interface PlaybackRemote {
  /**
   * Fetch the current playback state
   * @returns null when no device holds an active session
   */
  getPlayback(): Promise<RemotePlayback | null>;

  /**
   * Start or resume playback on the active device
   * @param request - What to play; omit to resume the current item
   */
  play(request?: PlayRequest): Promise<void>;

  pause(): Promise<void>;
  next(): Promise<void>;
  previous(): Promise<void>;
  seek(positionMs: number): Promise<void>;
  setVolume(percent: number): Promise<void>;

  /**
   * Move playback to another device
   * @param deviceId - Target device
   * @param play - Whether playback should start on the target
   */
  transferPlayback(deviceId: string, play?: boolean): Promise<void>;
}

/**
 * Catalog and library surface used by the browsing screens
 */
export interface LibraryRemote {
  /**
   * Search the catalog for tracks
   * @returns Matching tracks with `liked` left false
   */
  searchTracks(query: string, limit?: number): Promise<LibraryItem[]>;

  getLikedTracks(page?: PageRequest): Promise<Page<LibraryItem>>;
  saveTracks(trackIds: string[]): Promise<void>;
  removeTracks(trackIds: string[]): Promise<void>;

  /**
   * Check which of the given tracks are in the liked collection
   * @returns One flag per id, in the same order
   */
  checkSavedTracks(trackIds: string[]): Promise<boolean[]>;

  getPlaylists(page?: PageRequest): Promise<Page<PlaylistSummary>>;
  getPlaylistTracks(
    playlistId: string,
    page?: PageRequest,
  ): Promise<Page<LibraryItem>>;
  getDevices(): Promise<Device[]>;
}

export interface StreamingService extends PlaybackRemote, LibraryRemote {}
