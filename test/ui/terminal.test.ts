import { describe, it, expect } from "vitest";
import {
  describeNotice,
  formatItem,
  keyToCommand,
  renderStatus,
} from "../../src/ui/terminal";
import { INITIAL_VIEW_MODEL, type ViewModel } from "../../src/playback/ViewModelBus";
import { snapshot } from "../playback/fixtures";

const steps = { seekStepMs: 5000, volumeStep: 5 };

describe("keyToCommand", () => {
  it("maps the playback keys", () => {
    expect(keyToCommand({ name: "space", sequence: " " }, steps)).toEqual({
      type: "intent",
      intent: { kind: "togglePlayback" },
    });
    expect(keyToCommand({ name: "left", sequence: "\x1b[D" }, steps)).toEqual({
      type: "intent",
      intent: { kind: "seekBy", deltaMs: -5000 },
    });
    expect(keyToCommand({ sequence: "+" }, steps)).toEqual({
      type: "intent",
      intent: { kind: "volumeBy", delta: 5 },
    });
    expect(keyToCommand({ sequence: "-" }, steps)).toEqual({
      type: "intent",
      intent: { kind: "volumeBy", delta: -5 },
    });
  });

  it("maps the library keys", () => {
    expect(keyToCommand({ sequence: "/" }, steps)).toEqual({ type: "search" });
    expect(keyToCommand({ name: "3", sequence: "3" }, steps)).toEqual({
      type: "select",
      index: 2,
    });
    expect(keyToCommand({ name: "d", sequence: "d" }, steps)).toEqual({ type: "transferNext" });
    expect(keyToCommand({ name: "a", sequence: "a" }, steps)).toEqual({ type: "signIn" });
  });

  it("quits on q and ctrl-c", () => {
    expect(keyToCommand({ name: "q", sequence: "q" }, steps)).toEqual({ type: "quit" });
    expect(keyToCommand({ name: "c", ctrl: true, sequence: "\x03" }, steps)).toEqual({
      type: "quit",
    });
  });

  it("ignores unbound keys", () => {
    expect(keyToCommand({ name: "x", sequence: "x" }, steps)).toBeNull();
    expect(keyToCommand({ name: "0", sequence: "0" }, steps)).toBeNull();
  });
});

describe("renderStatus", () => {
  const playing = snapshot({ capturedAt: 0, positionMs: 61_000, durationMs: 200_000 });
  const base: ViewModel = {
    ...INITIAL_VIEW_MODEL,
    display: { kind: "authoritative", snapshot: playing },
    authoritative: playing,
    authoritativeAt: 0,
  };

  it("renders the track with interpolated progress", () => {
    expect(renderStatus(base, 2000)).toBe(
      "> Song One - Artist 1  1:03 / 3:20  vol 40%  [Kitchen]",
    );
  });

  it("marks optimistic, transferring and reconnecting states", () => {
    const paused = { ...playing, isPlaying: false };
    const state: ViewModel = {
      ...base,
      display: {
        kind: "optimistic",
        snapshot: paused,
        command: {
          id: 1,
          kind: "pause",
          description: "pause playback",
          issuedAt: 0,
          expectedEffect: () => true,
        },
      },
      transfer: { commandId: 2, deviceId: "dev-2", startedAt: 0 },
      connectivity: "reconnecting",
    };

    expect(renderStatus(state, 2000)).toBe(
      "|| Song One - Artist 1  1:01 / 3:20  vol 40%  [Kitchen]  *  (transferring...)  (reconnecting)",
    );
  });

  it("shows when no device is active", () => {
    expect(renderStatus(INITIAL_VIEW_MODEL)).toBe("No active device");
  });

  it("asks for a new sign-in once the session is gone", () => {
    expect(renderStatus({ ...base, connectivity: "reauthenticate" })).toBe(
      "Session expired. Press a to sign in again.",
    );
  });
});

describe("describeNotice", () => {
  it("names the new device", () => {
    expect(
      describeNotice({ type: "deviceChanged", from: "dev-1", to: "dev-2", deviceName: "Office" }),
    ).toBe("Playback moved to Office");
  });

  it("explains an unconfirmed command", () => {
    expect(
      describeNotice({
        type: "commandNotApplied",
        command: "skip",
        description: "skip to next track",
      }),
    ).toBe("Could not confirm: skip to next track");
  });

  it("points a revoked session to the in-app sign in", () => {
    expect(describeNotice({ type: "reauthenticate" })).toBe(
      "Spotify session revoked. Press a to sign in again.",
    );
  });

  it("includes the failure message", () => {
    expect(
      describeNotice({
        type: "commandFailed",
        command: "pause",
        description: "pause playback",
        error: "Rejected",
        message: "Premium required",
      }),
    ).toBe("Failed to pause playback: Premium required");
  });
});

describe("formatItem", () => {
  it("numbers items from one and marks liked ones", () => {
    expect(
      formatItem(
        {
          id: "t1",
          uri: "spotify:track:t1",
          title: "Song One",
          artists: ["A", "B"],
          album: "Album",
          durationMs: 125_000,
          liked: true,
        },
        0,
      ),
    ).toBe("1. + Song One - A, B (2:05)");
  });
});
