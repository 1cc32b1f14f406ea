// Type definitions for the Spotify Web API

export interface SpotifyImage {
  url: string;
  height: number | null;
  width: number | null;
}

export interface SpotifyArtist {
  id: string;
  name: string;
  uri: string;
}

export interface SpotifyAlbum {
  id: string;
  name: string;
  artists: SpotifyArtist[];
  images: SpotifyImage[];
  uri: string;
}

export interface SpotifyTrack {
  id: string | null;
  name: string;
  artists: SpotifyArtist[];
  album: SpotifyAlbum;
  duration_ms: number;
  uri: string;
  type?: "track";
}

export interface SpotifyEpisode {
  id: string;
  name: string;
  duration_ms: number;
  uri: string;
  type: "episode";
  show?: { name: string };
}

export interface SpotifySavedTrack {
  added_at: string;
  track: SpotifyTrack;
}

export interface SpotifyPlaylistTrack {
  added_at: string;
  track: SpotifyTrack | SpotifyEpisode | null;
}

export interface SpotifySimplifiedPlaylist {
  id: string;
  name: string;
  uri: string;
  tracks: { href: string; total: number };
}

export interface SpotifyDevice {
  id: string | null;
  is_active: boolean;
  is_restricted: boolean;
  name: string;
  type: string;
  volume_percent: number | null;
}

export interface SpotifyPlaybackState {
  device: SpotifyDevice;
  is_playing: boolean;
  progress_ms: number | null;
  timestamp: number;
  currently_playing_type: "track" | "episode" | "ad" | "unknown";
  item: SpotifyTrack | SpotifyEpisode | null;
  shuffle_state?: boolean;
  repeat_state?: "off" | "track" | "context";
}

export interface SpotifySearchResponse {
  tracks?: Paginated<SpotifyTrack>;
}

export interface SpotifyDevicesResponse {
  devices: SpotifyDevice[];
}

export interface SpotifyTokenResponse {
  access_token: string;
  token_type: string;
  scope: string;
  expires_in: number;
  refresh_token?: string;
}

export interface SpotifyErrorBody {
  error?: string | { status: number; message: string; reason?: string };
  error_description?: string;
}

export interface Paginated<T> {
  href: string;
  items: T[];
  limit: number;
  next: string | null;
  offset: number;
  previous: string | null;
  total: number;
}
