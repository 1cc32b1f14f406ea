import { vi } from "vitest";
import type { PlaybackSnapshot, RemotePlayback } from "../../src/types";
import type { PlaybackRemote } from "../../src/services/StreamingService";

export const remotePlayback = (
  overrides: Partial<RemotePlayback> = {},
): RemotePlayback => ({
  isPlaying: true,
  trackId: "t1",
  trackUri: "spotify:track:t1",
  title: "Song One",
  artists: ["Artist 1"],
  album: "Album 1",
  positionMs: 10_000,
  durationMs: 200_000,
  deviceId: "dev-1",
  deviceName: "Kitchen",
  volumePercent: 40,
  ...overrides,
});

export const snapshot = (
  overrides: Partial<PlaybackSnapshot> = {},
): PlaybackSnapshot => ({
  ...remotePlayback(),
  capturedAt: 0,
  ...overrides,
});

/** In-memory remote whose every call resolves immediately unless overridden */
export function fakeRemote() {
  return {
    getPlayback: vi.fn<PlaybackRemote["getPlayback"]>(async () => remotePlayback()),
    play: vi.fn<PlaybackRemote["play"]>(async () => undefined),
    pause: vi.fn<PlaybackRemote["pause"]>(async () => undefined),
    next: vi.fn<PlaybackRemote["next"]>(async () => undefined),
    previous: vi.fn<PlaybackRemote["previous"]>(async () => undefined),
    seek: vi.fn<PlaybackRemote["seek"]>(async () => undefined),
    setVolume: vi.fn<PlaybackRemote["setVolume"]>(async () => undefined),
    transferPlayback: vi.fn<PlaybackRemote["transferPlayback"]>(async () => undefined),
  } satisfies PlaybackRemote;
}
