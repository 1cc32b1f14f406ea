import type { PlaybackSnapshot } from "../types";
import type { ApiErrorKind } from "../utils/errors";
import type { CommandKind, PendingCommand } from "./commands";

export type DisplayState =
  | { kind: "authoritative"; snapshot: PlaybackSnapshot | null }
  | { kind: "optimistic"; snapshot: PlaybackSnapshot; command: PendingCommand };

export type Connectivity = "online" | "reconnecting" | "reauthenticate";

export interface TransferState {
  commandId: number;
  deviceId: string;
  startedAt: number;
}

export interface ViewModel {
  display: DisplayState;
  /** Last snapshot the service reported; null when no device is active */
  authoritative: PlaybackSnapshot | null;
  /** Capture time of the last accepted poll, including empty ones */
  authoritativeAt: number | null;
  connectivity: Connectivity;
  transfer: TransferState | null;
}

export type Notice =
  | {
      type: "deviceChanged";
      from: string | null;
      to: string | null;
      deviceName: string | null;
    }
  | { type: "commandNotApplied"; command: CommandKind; description: string }
  | {
      type: "commandFailed";
      command: CommandKind;
      description: string;
      error: ApiErrorKind | "Unknown";
      message: string;
    }
  | { type: "noActiveDevice" }
  | { type: "controlsBlocked"; reason: "transfer" }
  | { type: "reauthenticate" };

export type BusAction =
  | {
      type: "snapshot";
      snapshot: PlaybackSnapshot | null;
      capturedAt: number;
      /** False when the poll showed nothing new; the snapshot then only reconciles */
      changed: boolean;
    }
  | { type: "optimistic"; projection: PlaybackSnapshot; command: PendingCommand }
  | { type: "revert"; commandId: number }
  | { type: "transferStarted"; transfer: TransferState }
  | { type: "transferSettled"; commandId: number }
  | { type: "connectivity"; connectivity: Connectivity };

export type ViewModelListener = (state: ViewModel) => void;
export type NoticeListener = (notice: Notice) => void;

/** Read side handed to the UI */
export interface ViewModelReader {
  getState(): ViewModel;
  subscribe(listener: ViewModelListener): () => void;
  onNotice(listener: NoticeListener): () => void;
}

/** Write side held by the tracker and the dispatcher */
export interface ViewModelWriter {
  getState(): ViewModel;
  dispatch(action: BusAction): boolean;
  notify(notice: Notice): void;
}

export const INITIAL_VIEW_MODEL: ViewModel = {
  display: { kind: "authoritative", snapshot: null },
  authoritative: null,
  authoritativeAt: null,
  connectivity: "online",
  transfer: null,
};

/**
 * The snapshot the UI should render right now.
 */
export function displayedSnapshot(state: ViewModel): PlaybackSnapshot | null {
  return state.display.snapshot;
}

/**
 * All state transitions. Returns `state` itself when nothing changed.
 */
export function reduce(state: ViewModel, action: BusAction): ViewModel {
  switch (action.type) {
    case "snapshot": {
      // Never step back behind a snapshot that was already published
      if (state.authoritativeAt !== null && action.capturedAt < state.authoritativeAt) {
        return state;
      }

      const authoritative = action.changed ? action.snapshot : state.authoritative;
      const snapshot = action.snapshot;

      let transfer = state.transfer;
      if (transfer && snapshot && snapshot.deviceId === transfer.deviceId) {
        transfer = null;
      }

      let display: DisplayState = state.display;
      if (display.kind === "optimistic") {
        if (snapshot && display.command.expectedEffect(snapshot)) {
          display = { kind: "authoritative", snapshot: authoritative };
        }
      } else if (action.changed) {
        display = { kind: "authoritative", snapshot: authoritative };
      }

      const connectivity =
        state.connectivity === "reconnecting" ? "online" : state.connectivity;

      if (
        !action.changed &&
        display === state.display &&
        transfer === state.transfer &&
        connectivity === state.connectivity
      ) {
        return state;
      }

      return {
        ...state,
        display,
        authoritative,
        authoritativeAt: action.changed ? action.capturedAt : state.authoritativeAt,
        transfer,
        connectivity,
      };
    }

    case "optimistic":
      return {
        ...state,
        display: {
          kind: "optimistic",
          snapshot: action.projection,
          command: action.command,
        },
      };

    case "revert":
      if (
        state.display.kind !== "optimistic" ||
        state.display.command.id !== action.commandId
      ) {
        return state;
      }
      return {
        ...state,
        display: { kind: "authoritative", snapshot: state.authoritative },
      };

    case "transferStarted":
      return { ...state, transfer: action.transfer };

    case "transferSettled":
      if (state.transfer?.commandId !== action.commandId) {
        return state;
      }
      return { ...state, transfer: null };

    case "connectivity":
      if (state.connectivity === action.connectivity) {
        return state;
      }
      return { ...state, connectivity: action.connectivity };
  }
}

/**
 * Single-writer, many-reader cell holding what the UI renders. Every
 * mutation goes through `dispatch`, which runs the reducer to completion
 * before any listener sees the result.
 */
export class ViewModelBus implements ViewModelReader, ViewModelWriter {
  private state: ViewModel = INITIAL_VIEW_MODEL;
  private listeners = new Set<ViewModelListener>();
  private noticeListeners = new Set<NoticeListener>();
  private emitting = false;
  private queued: BusAction[] = [];

  getState(): ViewModel {
    return this.state;
  }

  /**
   * Subscribes to state changes, returns an unsubscribe function. The
   * listener is called once with the current state.
   */
  subscribe(listener: ViewModelListener): () => void {
    this.listeners.add(listener);
    listener(this.state);
    return () => {
      this.listeners.delete(listener);
    };
  }

  onNotice(listener: NoticeListener): () => void {
    this.noticeListeners.add(listener);
    return () => {
      this.noticeListeners.delete(listener);
    };
  }

  /**
   * Applies an action. Actions dispatched by a listener are queued and
   * applied after the current notification round. Returns whether the
   * state changed (always false for queued actions).
   */
  dispatch(action: BusAction): boolean {
    if (this.emitting) {
      this.queued.push(action);
      return false;
    }

    const changed = this.apply(action);
    while (this.queued.length > 0) {
      const next = this.queued.shift();
      if (next) this.apply(next);
    }
    return changed;
  }

  notify(notice: Notice): void {
    for (const listener of this.noticeListeners) listener(notice);
  }

  private apply(action: BusAction): boolean {
    const next = reduce(this.state, action);
    if (next === this.state) {
      return false;
    }
    this.state = next;
    this.emitting = true;
    try {
      for (const listener of this.listeners) listener(next);
    } finally {
      this.emitting = false;
    }
    return true;
  }
}
