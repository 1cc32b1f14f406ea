import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { CommandDispatcher } from "../../src/playback/CommandDispatcher";
import { ViewModelBus, type Notice } from "../../src/playback/ViewModelBus";
import type { PlaybackSnapshot } from "../../src/types";
import { ApiError, AuthError } from "../../src/utils/errors";
import { fakeRemote, snapshot } from "./fixtures";

const NOW = 1_700_000_000_000;

describe("CommandDispatcher", () => {
  let remote: ReturnType<typeof fakeRemote>;
  let bus: ViewModelBus;
  let notices: Notice[];
  let requestPoll: Mock<() => Promise<unknown>>;
  let dispatcher: CommandDispatcher;

  // What the tracker does with each poll result
  const publish = (overrides: Partial<PlaybackSnapshot> = {}, changed = true) => {
    const capturedAt = Date.now();
    const polled = snapshot({ capturedAt, ...overrides });
    bus.dispatch({ type: "snapshot", snapshot: polled, capturedAt, changed });
    dispatcher.reconcile(polled);
  };

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    remote = fakeRemote();
    bus = new ViewModelBus();
    notices = [];
    bus.onNotice((notice) => notices.push(notice));
    requestPoll = vi.fn<() => Promise<unknown>>(async () => "updated");
    dispatcher = new CommandDispatcher(remote, bus, {}, requestPoll);
  });

  afterEach(() => {
    dispatcher.dispose();
    vi.useRealTimers();
  });

  describe("optimistic commands", () => {
    beforeEach(() => publish());

    it("shows a pause before the call resolves and collapses on confirmation", async () => {
      let release: () => void = () => undefined;
      remote.pause.mockImplementationOnce(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          }),
      );

      const pending = dispatcher.submit({ kind: "pause" });

      const during = bus.getState();
      expect(during.display.kind).toBe("optimistic");
      expect(during.display.snapshot?.isPlaying).toBe(false);
      expect(during.authoritative?.isPlaying).toBe(true);
      expect(remote.pause).toHaveBeenCalledTimes(1);

      release();
      await pending;

      vi.advanceTimersByTime(1000);
      publish({ isPlaying: false, positionMs: 10_000 });
      expect(bus.getState().display).toEqual({
        kind: "authoritative",
        snapshot: bus.getState().authoritative,
      });

      await vi.advanceTimersByTimeAsync(10_000);
      expect(notices).toEqual([]);
      expect(bus.getState().display.snapshot?.isPlaying).toBe(false);
    });

    it("reverts a skip that no poll confirms and says so", async () => {
      const original = bus.getState().authoritative;

      await dispatcher.submit({ kind: "next" });
      expect(bus.getState().display.snapshot?.positionMs).toBe(0);

      // Three polls still showing the same track
      for (let i = 1; i <= 3; i++) {
        vi.advanceTimersByTime(1000);
        publish({ positionMs: 10_000 + i * 1000 }, false);
      }
      expect(bus.getState().display.kind).toBe("optimistic");
      expect(notices).toEqual([]);

      await vi.advanceTimersByTimeAsync(2000);

      expect(bus.getState().display).toEqual({ kind: "authoritative", snapshot: original });
      expect(notices).toEqual([
        { type: "commandNotApplied", command: "skip", description: "skip to next track" },
      ]);
    });

    it("reverts at once and reports a failed call", async () => {
      remote.pause.mockRejectedValueOnce(
        new ApiError("Rejected", "Premium required", { status: 403 }),
      );

      await dispatcher.submit({ kind: "pause" });

      expect(bus.getState().display).toEqual({
        kind: "authoritative",
        snapshot: bus.getState().authoritative,
      });
      expect(notices).toEqual([
        {
          type: "commandFailed",
          command: "pause",
          description: "pause playback",
          error: "Rejected",
          message: "Premium required",
        },
      ]);
    });

    it("reports a lost device instead of a generic failure", async () => {
      remote.play.mockRejectedValueOnce(new ApiError("NoActiveDevice", "No active device found"));
      publish({ isPlaying: false });

      await dispatcher.submit({ kind: "togglePlayback" });

      expect(remote.play).toHaveBeenCalledWith();
      expect(bus.getState().display.snapshot?.isPlaying).toBe(false);
      expect(notices).toEqual([{ type: "noActiveDevice" }]);
    });

    it("keeps an ambiguous skip projected and asks for a poll", async () => {
      remote.next.mockRejectedValueOnce(new ApiError("Ambiguous", "timed out"));

      await dispatcher.submit({ kind: "next" });

      expect(requestPoll).toHaveBeenCalledTimes(1);
      expect(bus.getState().display.kind).toBe("optimistic");
      expect(notices).toEqual([]);

      vi.advanceTimersByTime(1000);
      publish({ trackId: "t2", trackUri: "spotify:track:t2", positionMs: 800 });

      expect(bus.getState().display.kind).toBe("authoritative");
      expect(bus.getState().display.snapshot?.trackId).toBe("t2");
      await vi.advanceTimersByTimeAsync(10_000);
      expect(notices).toEqual([]);
    });

    it("reverts quietly when the session is revoked mid-call", async () => {
      remote.pause.mockRejectedValueOnce(new AuthError("RefreshDenied"));

      await dispatcher.submit({ kind: "pause" });

      expect(bus.getState().display.kind).toBe("authoritative");
      expect(notices).toEqual([]);
    });

    it("builds a newer intent on top of the live projection", async () => {
      await dispatcher.submit({ kind: "pause" });
      await dispatcher.submit({ kind: "togglePlayback" });

      expect(remote.pause).toHaveBeenCalledTimes(1);
      expect(remote.play).toHaveBeenCalledTimes(1);
      expect(bus.getState().display.snapshot?.isPlaying).toBe(true);

      // Only the newest command can expire
      await vi.advanceTimersByTimeAsync(5000);
      expect(notices).toEqual([
        { type: "commandNotApplied", command: "play", description: "resume playback" },
      ]);
    });

    it("still reports an older command the newest one did not replace", async () => {
      await dispatcher.submit({ kind: "pause" });
      const volume = dispatcher.submit({ kind: "volume", percent: 60 });
      await vi.advanceTimersByTimeAsync(300);
      await volume;

      // The volume change lands but playback never stops
      await vi.advanceTimersByTimeAsync(700);
      publish({ volumePercent: 60 });
      expect(bus.getState().display.kind).toBe("authoritative");
      expect(notices).toEqual([]);

      await vi.advanceTimersByTimeAsync(4000);
      expect(notices).toEqual([
        { type: "commandNotApplied", command: "pause", description: "pause playback" },
      ]);
      expect(bus.getState().display.snapshot).toMatchObject({
        isPlaying: true,
        volumePercent: 60,
      });

      await vi.advanceTimersByTimeAsync(10_000);
      expect(notices).toHaveLength(1);
    });

    it("drops an older command once a poll confirms it", async () => {
      await dispatcher.submit({ kind: "pause" });
      await dispatcher.submit({ kind: "next" });

      vi.advanceTimersByTime(1000);
      publish({ isPlaying: false });
      expect(bus.getState().display.kind).toBe("optimistic");

      await vi.advanceTimersByTimeAsync(4000);
      expect(notices).toEqual([
        { type: "commandNotApplied", command: "skip", description: "skip to next track" },
      ]);
    });

    it("plays a library item with a projection of that track", async () => {
      await dispatcher.submit({
        kind: "playTrack",
        uri: "spotify:track:t9",
        item: {
          id: "t9",
          uri: "spotify:track:t9",
          title: "Ninth",
          artists: ["Artist 9"],
          album: "Album 9",
          durationMs: 180_000,
          liked: false,
        },
      });

      expect(remote.play).toHaveBeenCalledWith({ uris: ["spotify:track:t9"] });
      const shown = bus.getState().display.snapshot;
      expect(shown?.trackId).toBe("t9");
      expect(shown?.title).toBe("Ninth");
      expect(shown?.positionMs).toBe(0);
      expect(shown?.durationMs).toBe(180_000);
    });
  });

  describe("debouncing", () => {
    beforeEach(() => publish());

    it("sends one seek carrying the last target", async () => {
      const first = dispatcher.submit({ kind: "seek", positionMs: 30_000 });
      expect(bus.getState().display.snapshot?.positionMs).toBe(30_000);

      await vi.advanceTimersByTimeAsync(100);
      const second = dispatcher.submit({ kind: "seek", positionMs: 60_000 });
      await vi.advanceTimersByTimeAsync(100);
      const third = dispatcher.submit({ kind: "seek", positionMs: 90_000 });
      expect(bus.getState().display.snapshot?.positionMs).toBe(90_000);
      expect(remote.seek).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(299);
      expect(remote.seek).not.toHaveBeenCalled();
      await vi.advanceTimersByTimeAsync(1);
      await Promise.all([first, second, third]);

      expect(remote.seek).toHaveBeenCalledTimes(1);
      expect(remote.seek).toHaveBeenCalledWith(90_000);

      // 800ms after the last intent the track is 800ms past the target
      await vi.advanceTimersByTimeAsync(500);
      publish({ positionMs: 90_800 });
      expect(bus.getState().display.kind).toBe("authoritative");
    });

    it("accumulates relative volume steps into one call", async () => {
      const steps = [1, 2, 3].map(() =>
        dispatcher.submit({ kind: "volumeBy", delta: 5 }),
      );
      expect(bus.getState().display.snapshot?.volumePercent).toBe(55);

      await vi.advanceTimersByTimeAsync(300);
      await Promise.all(steps);

      expect(remote.setVolume).toHaveBeenCalledTimes(1);
      expect(remote.setVolume).toHaveBeenCalledWith(55);
    });

    it("clamps a relative seek to the track", async () => {
      const pending = dispatcher.submit({ kind: "seekBy", deltaMs: -60_000 });
      await vi.advanceTimersByTimeAsync(300);
      await pending;

      expect(remote.seek).toHaveBeenCalledWith(0);
    });
  });

  describe("device transfer", () => {
    beforeEach(() => publish());

    it("blocks playback controls until the target device reports", async () => {
      await dispatcher.submit({ kind: "transferDevice", deviceId: "dev-2" });

      expect(remote.transferPlayback).toHaveBeenCalledWith("dev-2", true);
      expect(bus.getState().display.kind).toBe("authoritative");
      expect(bus.getState().transfer?.deviceId).toBe("dev-2");

      await dispatcher.submit({ kind: "pause" });
      expect(remote.pause).not.toHaveBeenCalled();
      expect(notices).toEqual([{ type: "controlsBlocked", reason: "transfer" }]);

      vi.advanceTimersByTime(1000);
      publish({ deviceId: "dev-2", deviceName: "Office" });
      expect(bus.getState().transfer).toBeNull();

      await dispatcher.submit({ kind: "pause" });
      expect(remote.pause).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(10_000);
      expect(notices.filter((n) => n.type === "commandNotApplied")).toEqual([
        { type: "commandNotApplied", command: "pause", description: "pause playback" },
      ]);
    });

    it("releases the controls when the transfer never shows up", async () => {
      await dispatcher.submit({ kind: "transferDevice", deviceId: "dev-2" });

      await vi.advanceTimersByTimeAsync(5000);

      expect(bus.getState().transfer).toBeNull();
      expect(notices).toEqual([
        {
          type: "commandNotApplied",
          command: "transferDevice",
          description: "transfer playback",
        },
      ]);
    });

    it("releases the controls when the transfer call fails", async () => {
      remote.transferPlayback.mockRejectedValueOnce(new ApiError("Unavailable", "down"));

      await dispatcher.submit({ kind: "transferDevice", deviceId: "dev-2" });

      expect(bus.getState().transfer).toBeNull();
      expect(notices).toEqual([
        {
          type: "commandFailed",
          command: "transferDevice",
          description: "transfer playback",
          error: "Unavailable",
          message: "down",
        },
      ]);
    });
  });

  it("releases a pending transfer when halted", async () => {
    publish();
    await dispatcher.submit({ kind: "transferDevice", deviceId: "dev-2" });
    expect(bus.getState().transfer?.deviceId).toBe("dev-2");

    dispatcher.halt();
    dispatcher.resume();

    expect(bus.getState().transfer).toBeNull();
    await dispatcher.submit({ kind: "pause" });
    expect(remote.pause).toHaveBeenCalledTimes(1);
  });

  it("tells the user there is no device when nothing is playing anywhere", async () => {
    await dispatcher.submit({ kind: "play" });

    expect(remote.play).not.toHaveBeenCalled();
    expect(notices).toEqual([{ type: "noActiveDevice" }]);
  });

  it("transfers without a current snapshot", async () => {
    await dispatcher.submit({ kind: "transferDevice", deviceId: "dev-2" });

    expect(remote.transferPlayback).toHaveBeenCalledWith("dev-2", false);
  });

  it("refuses intents once halted and cancels pending deadlines", async () => {
    publish();
    await dispatcher.submit({ kind: "pause" });
    const coalesced = dispatcher.submit({ kind: "volume", percent: 10 });

    dispatcher.halt();
    await coalesced;

    // Nothing can confirm the projection any more
    expect(bus.getState().display).toEqual({
      kind: "authoritative",
      snapshot: bus.getState().authoritative,
    });

    await vi.advanceTimersByTimeAsync(10_000);
    expect(remote.setVolume).not.toHaveBeenCalled();
    expect(notices).toEqual([]);

    await dispatcher.submit({ kind: "next" });
    expect(remote.next).not.toHaveBeenCalled();
    expect(notices).toEqual([{ type: "reauthenticate" }]);
  });
});
