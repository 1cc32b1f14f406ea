import type { PlaybackSnapshot, RemotePlayback } from "../types";

export function createSnapshot(
  remote: RemotePlayback,
  capturedAt: number,
): PlaybackSnapshot {
  return Object.freeze({
    ...remote,
    artists: Object.freeze([...remote.artists]),
    capturedAt,
  });
}

/**
 * Derives a new snapshot from `base`; used for optimistic projections.
 */
export function projectSnapshot(
  base: PlaybackSnapshot,
  changes: Partial<PlaybackSnapshot>,
): PlaybackSnapshot {
  return Object.freeze({ ...base, ...changes });
}

/**
 * Position at `now`, advanced by wall-clock time while playing.
 */
export function interpolatePosition(
  snapshot: PlaybackSnapshot,
  now: number = Date.now(),
): number {
  if (!snapshot.isPlaying) {
    return snapshot.positionMs;
  }
  const elapsed = Math.max(0, now - snapshot.capturedAt);
  const position = snapshot.positionMs + elapsed;
  return snapshot.durationMs > 0 ? Math.min(position, snapshot.durationMs) : position;
}

/**
 * Whether `next` carries nothing the previous snapshot (advanced to
 * `next.capturedAt`) does not already show.
 */
export function isEquivalent(
  previous: PlaybackSnapshot | null,
  next: PlaybackSnapshot | null,
  positionToleranceMs: number,
): boolean {
  if (previous === null || next === null) {
    return previous === next;
  }
  if (
    previous.trackId !== next.trackId ||
    previous.isPlaying !== next.isPlaying ||
    previous.deviceId !== next.deviceId ||
    previous.volumePercent !== next.volumePercent ||
    previous.durationMs !== next.durationMs
  ) {
    return false;
  }
  const expected = interpolatePosition(previous, next.capturedAt);
  return Math.abs(expected - next.positionMs) <= positionToleranceMs;
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(Math.max(0, ms) / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${seconds.toString().padStart(2, "0")}`;
}
