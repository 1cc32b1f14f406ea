import { emitKeypressEvents, type Key } from "node:readline";
import { createInterface } from "node:readline/promises";
import { captureException } from "@sentry/node";
import type { LibraryItem } from "../types";
import type { LibraryService } from "../services/library-service";
import type { PlaybackEngine } from "../playback/PlaybackEngine";
import type { Intent } from "../playback/commands";
import { interpolatePosition, formatDuration } from "../playback/snapshot";
import type { Notice, ViewModel } from "../playback/ViewModelBus";
import type { EngineOptions } from "../playback/options";
import { describeError } from "../utils/errors";

const STATUS_REFRESH_MS = 500;
const MAX_LISTED = 9;

export type TerminalCommand =
  | { type: "intent"; intent: Intent }
  | { type: "transferNext" }
  | { type: "likeCurrent" }
  | { type: "search" }
  | { type: "liked" }
  | { type: "select"; index: number }
  | { type: "signIn" }
  | { type: "quit" };

/**
 * Maps one keypress to what the shell should do, or null for unbound keys.
 */
export function keyToCommand(
  key: Key,
  steps: Pick<EngineOptions, "seekStepMs" | "volumeStep">,
): TerminalCommand | null {
  if (key.ctrl && key.name === "c") {
    return { type: "quit" };
  }

  switch (key.name) {
    case "space":
      return { type: "intent", intent: { kind: "togglePlayback" } };
    case "n":
      return { type: "intent", intent: { kind: "next" } };
    case "p":
      return { type: "intent", intent: { kind: "previous" } };
    case "left":
      return { type: "intent", intent: { kind: "seekBy", deltaMs: -steps.seekStepMs } };
    case "right":
      return { type: "intent", intent: { kind: "seekBy", deltaMs: steps.seekStepMs } };
    case "d":
      return { type: "transferNext" };
    case "s":
      return { type: "likeCurrent" };
    case "l":
      return { type: "liked" };
    case "a":
      return { type: "signIn" };
    case "q":
      return { type: "quit" };
  }

  switch (key.sequence) {
    case "+":
    case "=":
      return { type: "intent", intent: { kind: "volumeBy", delta: steps.volumeStep } };
    case "-":
      return { type: "intent", intent: { kind: "volumeBy", delta: -steps.volumeStep } };
    case "/":
      return { type: "search" };
  }

  if (key.sequence && /^[1-9]$/.test(key.sequence)) {
    return { type: "select", index: Number(key.sequence) - 1 };
  }
  return null;
}

export function renderStatus(state: ViewModel, now: number = Date.now()): string {
  if (state.connectivity === "reauthenticate") {
    return "Session expired. Press a to sign in again.";
  }

  const snapshot = state.display.snapshot;
  let line: string;
  if (!snapshot) {
    line = "No active device";
  } else {
    const icon = snapshot.isPlaying ? ">" : "||";
    const title = snapshot.title ?? "Nothing playing";
    const artists = snapshot.artists.length > 0 ? ` - ${snapshot.artists.join(", ")}` : "";
    const progress = `${formatDuration(interpolatePosition(snapshot, now))} / ${formatDuration(snapshot.durationMs)}`;
    const volume = snapshot.volumePercent === null ? "" : `  vol ${snapshot.volumePercent}%`;
    const device = snapshot.deviceName ? `  [${snapshot.deviceName}]` : "";
    line = `${icon} ${title}${artists}  ${progress}${volume}${device}`;
  }

  if (state.display.kind === "optimistic") {
    line += "  *";
  }
  if (state.transfer) {
    line += "  (transferring...)";
  }
  if (state.connectivity === "reconnecting") {
    line += "  (reconnecting)";
  }
  return line;
}

export function describeNotice(notice: Notice): string {
  switch (notice.type) {
    case "deviceChanged":
      return `Playback moved to ${notice.deviceName ?? "another device"}`;
    case "commandNotApplied":
      return `Could not confirm: ${notice.description}`;
    case "commandFailed":
      return `Failed to ${notice.description}: ${notice.message}`;
    case "noActiveDevice":
      return "No active device. Start Spotify somewhere or press d to pick one.";
    case "controlsBlocked":
      return "Waiting for the device transfer to finish";
    case "reauthenticate":
      return "Spotify session revoked. Press a to sign in again.";
  }
}

export function formatItem(item: LibraryItem, index: number): string {
  const liked = item.liked ? "+" : " ";
  return `${index + 1}. ${liked} ${item.title} - ${item.artists.join(", ")} (${formatDuration(item.durationMs)})`;
}

export interface TerminalOptions {
  input?: NodeJS.ReadStream;
  output?: NodeJS.WriteStream;
  /** Runs a fresh browser authorization, printing through the UI */
  reauthorize?: (print: (line: string) => void) => Promise<void>;
}

/**
 * Keyboard-driven front end. Renders one status line from the view model
 * and prints notices above it.
 */
export class TerminalUI {
  private readonly input: NodeJS.ReadStream;
  private readonly output: NodeJS.WriteStream;
  private readonly reauthorize: TerminalOptions["reauthorize"];
  private signingIn = false;
  private listed: LibraryItem[] = [];
  private prompting = false;
  private refreshTimer: ReturnType<typeof setInterval> | null = null;
  private cleanup: Array<() => void> = [];
  private resolveClosed: () => void = () => undefined;

  constructor(
    private readonly engine: PlaybackEngine,
    private readonly library: LibraryService,
    options: TerminalOptions = {},
  ) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.reauthorize = options.reauthorize;
  }

  /** Resolves when the user quits. */
  run(): Promise<void> {
    const closed = new Promise<void>((resolve) => {
      this.resolveClosed = resolve;
    });

    emitKeypressEvents(this.input);
    if (this.input.isTTY) {
      this.input.setRawMode(true);
    }
    const onKeypress = (_text: string | undefined, key: Key | undefined) => {
      if (!key || this.prompting) return;
      this.handle(key).catch((error: unknown) => {
        captureException(error);
        this.print(`Error: ${describeError(error)}`);
      });
    };
    this.input.on("keypress", onKeypress);
    this.input.resume();

    this.cleanup.push(
      () => this.input.off("keypress", onKeypress),
      this.engine.view.subscribe(() => this.render()),
      this.engine.view.onNotice((notice) => this.print(describeNotice(notice))),
    );
    this.refreshTimer = setInterval(() => this.render(), STATUS_REFRESH_MS);

    this.print("space play/pause  n/p skip  <-/-> seek  +/- volume  d device  s like  / search  l liked  a sign in  q quit");
    return closed;
  }

  close(): void {
    if (this.refreshTimer !== null) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = null;
    }
    for (const fn of this.cleanup) fn();
    this.cleanup = [];
    if (this.input.isTTY) {
      this.input.setRawMode(false);
    }
    this.input.pause();
    this.output.write("\n");
    this.resolveClosed();
  }

  private async handle(key: Key): Promise<void> {
    const command = keyToCommand(key, this.engine.options);
    if (!command) return;

    switch (command.type) {
      case "quit":
        this.close();
        return;
      case "intent":
        await this.engine.submit(command.intent);
        return;
      case "transferNext":
        await this.transferToNextDevice();
        return;
      case "likeCurrent":
        await this.likeCurrent();
        return;
      case "search":
        await this.search();
        return;
      case "liked": {
        const page = await this.library.likedTracks({ limit: MAX_LISTED });
        this.list(page.items, `Liked tracks (${page.total})`);
        return;
      }
      case "signIn":
        await this.signIn();
        return;
      case "select": {
        const item = this.listed[command.index];
        if (!item) return;
        await this.engine.submit({ kind: "playTrack", uri: item.uri, item });
        return;
      }
    }
  }

  private async transferToNextDevice(): Promise<void> {
    const devices = await this.library.devices();
    if (devices.length === 0) {
      this.print("No Spotify devices available");
      return;
    }
    const current = devices.findIndex((device) => device.isActive);
    const target = devices[(current + 1) % devices.length];
    if (!target || target.isActive) {
      this.print("No other device to transfer to");
      return;
    }
    this.print(`Transferring to ${target.name}`);
    await this.engine.submit({ kind: "transferDevice", deviceId: target.id });
  }

  private async signIn(): Promise<void> {
    if (this.engine.view.getState().connectivity !== "reauthenticate" || this.signingIn) {
      return;
    }
    if (!this.reauthorize) {
      this.print("Restart playdeck to sign in again");
      return;
    }
    this.signingIn = true;
    try {
      await this.reauthorize((line) => this.print(line));
    } finally {
      this.signingIn = false;
    }
    this.engine.resume();
  }

  private async likeCurrent(): Promise<void> {
    const trackId = this.engine.view.getState().authoritative?.trackId;
    if (!trackId) {
      this.print("Nothing playing to like");
      return;
    }
    const liked = await this.library.toggleLikeTrack(trackId);
    this.print(liked ? "Added to liked tracks" : "Removed from liked tracks");
  }

  private async search(): Promise<void> {
    this.prompting = true;
    this.engine.setFocused(false);
    if (this.input.isTTY) this.input.setRawMode(false);
    this.output.write("\r\x1b[2K");

    const rl = createInterface({ input: this.input, output: this.output });
    let query: string;
    try {
      query = await rl.question("Search: ");
    } finally {
      rl.close();
      if (this.input.isTTY) this.input.setRawMode(true);
      this.input.resume();
      this.prompting = false;
      this.engine.setFocused(true);
    }

    const results = await this.library.search(query);
    this.list(results.slice(0, MAX_LISTED), `Results for "${query.trim()}"`);
  }

  private list(items: LibraryItem[], heading: string): void {
    this.listed = items;
    if (items.length === 0) {
      this.print(`${heading}: nothing found`);
      return;
    }
    this.print(heading);
    items.forEach((item, index) => this.print(formatItem(item, index)));
  }

  private print(line: string): void {
    this.output.write(`\r\x1b[2K${line}\n`);
    this.render();
  }

  private render(): void {
    if (this.prompting) return;
    this.output.write(`\r\x1b[2K${renderStatus(this.engine.view.getState())}`);
  }
}
