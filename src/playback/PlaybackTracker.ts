import { captureException } from "@sentry/node";
import type { PlaybackSnapshot } from "../types";
import type { PlaybackRemote } from "../services/StreamingService";
import { ApiError, AuthError, describeError } from "../utils/errors";
import { createSnapshot, isEquivalent } from "./snapshot";
import type { ViewModelWriter } from "./ViewModelBus";
import { DEFAULT_ENGINE_OPTIONS, type EngineOptions } from "./options";

type TrackerPhase = "idle" | "polling" | "halted";
export type PollOutcome = "updated" | "unchanged" | "failed";

type TrackerOptions = Pick<
  EngineOptions,
  | "focusedIntervalMs"
  | "backgroundIntervalMs"
  | "staleAfterMs"
  | "maxBackoffMs"
  | "positionToleranceMs"
>;

type SnapshotListener = (snapshot: PlaybackSnapshot | null, outcome: PollOutcome) => void;

/**
 * Polls the remote playback state on a fixed cadence and publishes what
 * changed. Polls never overlap: the next one is only scheduled once the
 * previous one has settled, and `pollOnce` joins a poll already in flight.
 */
export class PlaybackTracker {
  private phase: TrackerPhase = "halted";
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<PollOutcome> | null = null;
  private focused = true;
  private failures = 0;
  private lastSuccessAt: number | null = null;
  private startedAt = 0;
  private readonly options: TrackerOptions;
  private readonly listeners = new Set<SnapshotListener>();

  constructor(
    private readonly remote: Pick<PlaybackRemote, "getPlayback">,
    private readonly bus: ViewModelWriter,
    options: Partial<TrackerOptions> = {},
  ) {
    this.options = { ...DEFAULT_ENGINE_OPTIONS, ...options };
  }

  onSnapshot(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  start(): void {
    if (this.phase !== "halted") return;
    this.phase = "idle";
    this.failures = 0;
    this.startedAt = Date.now();
    this.schedule(0);
  }

  /** Cancels the poll timer. A poll already in flight is left to finish. */
  stop(): void {
    this.phase = "halted";
    this.clearTimer();
  }

  setFocused(focused: boolean): void {
    if (this.focused === focused) return;
    this.focused = focused;
    if (this.phase === "idle" && this.timer !== null) {
      // Coming back into focus polls right away; leaving it slows down
      this.clearTimer();
      this.schedule(focused ? 0 : this.nextDelay());
    }
  }

  pollOnce(): Promise<PollOutcome> {
    if (this.inFlight) {
      return this.inFlight;
    }
    this.inFlight = this.poll().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async poll(): Promise<PollOutcome> {
    if (this.phase !== "halted") this.phase = "polling";
    try {
      const remote = await this.remote.getPlayback();
      const capturedAt = Date.now();
      const snapshot = remote ? createSnapshot(remote, capturedAt) : null;
      const state = this.bus.getState();
      const previous = state.authoritative;
      const changed =
        state.authoritativeAt === null ||
        !isEquivalent(previous, snapshot, this.options.positionToleranceMs);

      this.failures = 0;
      this.lastSuccessAt = capturedAt;

      if (
        changed &&
        previous &&
        snapshot &&
        previous.deviceId !== snapshot.deviceId &&
        state.transfer?.deviceId !== snapshot.deviceId
      ) {
        this.bus.notify({
          type: "deviceChanged",
          from: previous.deviceId,
          to: snapshot.deviceId,
          deviceName: snapshot.deviceName,
        });
      }

      this.bus.dispatch({ type: "snapshot", snapshot, capturedAt, changed });

      const outcome: PollOutcome = changed ? "updated" : "unchanged";
      for (const listener of this.listeners) listener(snapshot, outcome);
      return outcome;
    } catch (error) {
      this.onFailure(error);
      return "failed";
    } finally {
      if (this.phase === "polling") this.phase = "idle";
    }
  }

  private onFailure(error: unknown): void {
    if (error instanceof AuthError) {
      // The engine reacts to revocation; nothing to poll until then
      console.warn("Playback polling halted:", error.message);
      this.stop();
      return;
    }

    this.failures++;
    if (!(error instanceof ApiError)) {
      captureException(error);
    }
    console.warn(`Playback poll failed (${this.failures}):`, describeError(error));

    const since = this.lastSuccessAt ?? this.startedAt;
    if (Date.now() - since >= this.options.staleAfterMs) {
      this.bus.dispatch({ type: "connectivity", connectivity: "reconnecting" });
    }
  }

  private async tick(): Promise<void> {
    this.timer = null;
    await this.pollOnce();
    if (this.phase === "idle") {
      this.schedule(this.nextDelay());
    }
  }

  private nextDelay(): number {
    const interval = this.focused
      ? this.options.focusedIntervalMs
      : this.options.backgroundIntervalMs;
    if (this.failures === 0) {
      return interval;
    }
    return Math.min(interval * 2 ** this.failures, this.options.maxBackoffMs);
  }

  private schedule(delayMs: number): void {
    this.clearTimer();
    this.timer = setTimeout(() => {
      void this.tick();
    }, delayMs);
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
