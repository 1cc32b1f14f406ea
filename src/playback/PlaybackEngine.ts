import type { PlaybackRemote } from "../services/StreamingService";
import type { TokenStore } from "../services/TokenStore";
import { describeError } from "../utils/errors";
import { CommandDispatcher } from "./CommandDispatcher";
import { PlaybackTracker } from "./PlaybackTracker";
import { ViewModelBus, type ViewModelReader } from "./ViewModelBus";
import type { Intent } from "./commands";
import { DEFAULT_ENGINE_OPTIONS, type EngineOptions } from "./options";

/**
 * Owns the bus and the two components allowed to write to it. The UI only
 * sees `view` and calls `submit`.
 */
export class PlaybackEngine {
  readonly view: ViewModelReader;
  readonly options: EngineOptions;

  private readonly bus = new ViewModelBus();
  private readonly tracker: PlaybackTracker;
  private readonly dispatcher: CommandDispatcher;
  private readonly offRevoked: () => void;
  private readonly offSnapshot: () => void;

  constructor(
    remote: PlaybackRemote,
    private readonly tokens: Pick<TokenStore, "onRevoked">,
    options: Partial<EngineOptions> = {},
  ) {
    this.options = { ...DEFAULT_ENGINE_OPTIONS, ...options };
    this.view = this.bus;
    this.tracker = new PlaybackTracker(remote, this.bus, this.options);
    this.dispatcher = new CommandDispatcher(remote, this.bus, this.options, () =>
      this.tracker.pollOnce(),
    );
    // Every poll is checked against all outstanding commands, not just the one on display
    this.offSnapshot = this.tracker.onSnapshot((snapshot) =>
      this.dispatcher.reconcile(snapshot),
    );
    this.offRevoked = this.tokens.onRevoked((error) => {
      console.warn("Spotify session revoked:", describeError(error));
      this.halt();
    });
  }

  start(): void {
    this.tracker.start();
  }

  submit(intent: Intent): Promise<void> {
    return this.dispatcher.submit(intent);
  }

  setFocused(focused: boolean): void {
    this.tracker.setFocused(focused);
  }

  /** Picks up again after the user signed in anew. */
  resume(): void {
    this.dispatcher.resume();
    this.bus.dispatch({ type: "connectivity", connectivity: "online" });
    this.tracker.start();
  }

  /**
   * Cancels the poll, debounce and deadline timers. Requests already on the
   * wire are left to finish.
   */
  shutdown(): void {
    this.tracker.stop();
    this.dispatcher.dispose();
    this.offSnapshot();
    this.offRevoked();
  }

  private halt(): void {
    this.tracker.stop();
    this.dispatcher.halt();
    this.bus.dispatch({ type: "connectivity", connectivity: "reauthenticate" });
    this.bus.notify({ type: "reauthenticate" });
  }
}
