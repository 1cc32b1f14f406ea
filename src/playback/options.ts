export interface EngineOptions {
  /** Poll cadence while a playback-relevant screen has focus */
  focusedIntervalMs: number;
  backgroundIntervalMs: number;
  /** No successful poll for this long marks the display as reconnecting */
  staleAfterMs: number;
  maxBackoffMs: number;
  /** Drift between a polled and an interpolated position still treated as unchanged */
  positionToleranceMs: number;
  reconcileDeadlineMs: number;
  debounceMs: number;
  seekStepMs: number;
  volumeStep: number;
}

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  focusedIntervalMs: 1000,
  backgroundIntervalMs: 5000,
  staleAfterMs: 10_000,
  maxBackoffMs: 15_000,
  positionToleranceMs: 1500,
  reconcileDeadlineMs: 5000,
  debounceMs: 300,
  seekStepMs: 5000,
  volumeStep: 5,
};
