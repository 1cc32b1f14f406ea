import type { LibraryItem, PlaybackSnapshot } from "../types";
import type { PlaybackRemote } from "../services/StreamingService";
import { trackIdFromUri } from "../services/SpotifyService";
import { interpolatePosition, projectSnapshot } from "./snapshot";

/** User intents accepted by the dispatcher */
export type Intent =
  | { kind: "play" }
  | { kind: "pause" }
  | { kind: "togglePlayback" }
  | { kind: "next" }
  | { kind: "previous" }
  | { kind: "seek"; positionMs: number }
  | { kind: "seekBy"; deltaMs: number }
  | { kind: "volume"; percent: number }
  | { kind: "volumeBy"; delta: number }
  | { kind: "playTrack"; uri: string; item?: LibraryItem }
  | { kind: "playContext"; contextUri: string; offset: number; item?: LibraryItem }
  | { kind: "transferDevice"; deviceId: string };

export type PlaybackIntent = Exclude<Intent, { kind: "transferDevice" }>;

export type CommandKind =
  | "play"
  | "pause"
  | "skip"
  | "seek"
  | "volume"
  | "transferDevice";

export interface PendingCommand {
  readonly id: number;
  readonly kind: CommandKind;
  readonly description: string;
  readonly issuedAt: number;
  expectedEffect(snapshot: PlaybackSnapshot): boolean;
}

export interface CommandPlan {
  kind: CommandKind;
  description: string;
  /** Local guess at the resulting state; null when none is safe to make */
  projection: PlaybackSnapshot | null;
  expectedEffect(snapshot: PlaybackSnapshot): boolean;
  send(remote: PlaybackRemote): Promise<void>;
  /** Plans sharing a key coalesce into one trailing call */
  debounceKey?: "seek" | "volume";
  /** Kinds of older outstanding commands this one makes moot */
  replaces?: readonly CommandKind[];
}

export interface PlanContext {
  now: number;
  positionToleranceMs: number;
}

const DEFAULT_REPLACES: Record<CommandKind, readonly CommandKind[]> = {
  play: ["play", "pause"],
  pause: ["play", "pause"],
  skip: ["skip", "seek"],
  seek: ["seek"],
  volume: ["volume"],
  transferDevice: ["transferDevice"],
};

// Starting another track also drops any seek or skip still in flight
const TRACK_CHANGE_REPLACES: readonly CommandKind[] = ["play", "pause", "skip", "seek"];

export function replacedKinds(plan: CommandPlan): readonly CommandKind[] {
  return plan.replaces ?? DEFAULT_REPLACES[plan.kind];
}

// Spotify restarts the current track instead of going back past this point
const PREVIOUS_RESTART_THRESHOLD_MS = 3000;

function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

/**
 * Turns an intent into what the dispatcher publishes, sends and later
 * checks for. Relative intents resolve against `current`, which is the
 * displayed (possibly optimistic) snapshot.
 */
export function planCommand(
  intent: PlaybackIntent,
  current: PlaybackSnapshot,
  context: PlanContext,
): CommandPlan {
  const { now, positionToleranceMs } = context;
  const position = interpolatePosition(current, now);

  switch (intent.kind) {
    case "togglePlayback":
      return planCommand(
        current.isPlaying ? { kind: "pause" } : { kind: "play" },
        current,
        context,
      );

    case "play":
      return {
        kind: "play",
        description: "resume playback",
        projection: projectSnapshot(current, {
          isPlaying: true,
          positionMs: position,
          capturedAt: now,
        }),
        expectedEffect: (s) => s.isPlaying,
        send: (remote) => remote.play(),
      };

    case "pause":
      return {
        kind: "pause",
        description: "pause playback",
        projection: projectSnapshot(current, {
          isPlaying: false,
          positionMs: position,
          capturedAt: now,
        }),
        expectedEffect: (s) => !s.isPlaying,
        send: (remote) => remote.pause(),
      };

    case "next":
      return {
        kind: "skip",
        description: "skip to next track",
        projection: projectSnapshot(current, { positionMs: 0, capturedAt: now }),
        expectedEffect: (s) => s.trackId !== current.trackId,
        send: (remote) => remote.next(),
      };

    case "previous": {
      const restarts = position > PREVIOUS_RESTART_THRESHOLD_MS;
      return {
        kind: "skip",
        description: restarts ? "restart track" : "skip to previous track",
        projection: projectSnapshot(current, { positionMs: 0, capturedAt: now }),
        expectedEffect: (s) =>
          s.trackId !== current.trackId ||
          s.positionMs <= Math.max(0, s.capturedAt - now) + positionToleranceMs,
        send: (remote) => remote.previous(),
      };
    }

    case "seek":
    case "seekBy": {
      const requested =
        intent.kind === "seek" ? intent.positionMs : position + intent.deltaMs;
      const target =
        current.durationMs > 0
          ? clamp(requested, 0, current.durationMs)
          : Math.max(0, requested);
      return {
        kind: "seek",
        description: "seek",
        projection: projectSnapshot(current, {
          positionMs: target,
          capturedAt: now,
        }),
        expectedEffect: (s) => {
          if (s.trackId !== current.trackId) return false;
          const expected = s.isPlaying
            ? target + Math.max(0, s.capturedAt - now)
            : target;
          return Math.abs(s.positionMs - expected) <= positionToleranceMs;
        },
        send: (remote) => remote.seek(target),
        debounceKey: "seek",
      };
    }

    case "volume":
    case "volumeBy": {
      const base = current.volumePercent ?? 50;
      const target = Math.round(
        clamp(intent.kind === "volume" ? intent.percent : base + intent.delta, 0, 100),
      );
      return {
        kind: "volume",
        description: `set volume to ${target}%`,
        projection: projectSnapshot(current, {
          volumePercent: target,
          positionMs: position,
          capturedAt: now,
        }),
        expectedEffect: (s) => s.volumePercent === target,
        send: (remote) => remote.setVolume(target),
        debounceKey: "volume",
      };
    }

    case "playTrack": {
      const trackId = intent.item?.id ?? trackIdFromUri(intent.uri);
      return {
        kind: "play",
        description: `play ${intent.item?.title ?? intent.uri}`,
        projection: projectTrack(current, now, intent.uri, trackId, intent.item),
        expectedEffect: (s) => s.trackId === trackId && s.isPlaying,
        send: (remote) => remote.play({ uris: [intent.uri] }),
        replaces: TRACK_CHANGE_REPLACES,
      };
    }

    case "playContext": {
      const item = intent.item;
      return {
        kind: "play",
        description: `play ${item?.title ?? intent.contextUri}`,
        projection: item
          ? projectTrack(current, now, item.uri, item.id, item)
          : projectSnapshot(current, { isPlaying: true, positionMs: 0, capturedAt: now }),
        expectedEffect: item
          ? (s) => s.trackId === item.id && s.isPlaying
          : (s) => s.isPlaying && s.trackId !== current.trackId,
        send: (remote) =>
          remote.play({ contextUri: intent.contextUri, offset: intent.offset }),
        replaces: TRACK_CHANGE_REPLACES,
      };
    }
  }
}

/**
 * Transfers are never projected: there is no safe local guess at how the
 * target device will report its state.
 */
export function planTransfer(
  deviceId: string,
  current: PlaybackSnapshot | null,
): CommandPlan {
  return {
    kind: "transferDevice",
    description: "transfer playback",
    projection: null,
    expectedEffect: (s) => s.deviceId === deviceId,
    send: (remote) => remote.transferPlayback(deviceId, current?.isPlaying ?? false),
  };
}

function projectTrack(
  current: PlaybackSnapshot,
  now: number,
  uri: string,
  trackId: string,
  item?: LibraryItem,
): PlaybackSnapshot {
  return projectSnapshot(current, {
    isPlaying: true,
    trackId,
    trackUri: uri,
    title: item?.title ?? null,
    artists: item?.artists ?? [],
    album: item?.album ?? null,
    durationMs: item?.durationMs ?? 0,
    positionMs: 0,
    capturedAt: now,
  });
}
