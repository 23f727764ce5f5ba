import { describe, expect, it } from "vitest";
import { normalizeUnplayableReason, UnplayableTracker } from "../src/main/services/unplayable-tracker.js";

describe("normalizeUnplayableReason", () => {
  it("keeps the first line only", () => {
    expect(normalizeUnplayableReason("  Decoder error\n    at demux (codec)\n")).toBe("Decoder error");
  });

  it("falls back to the default reason", () => {
    expect(normalizeUnplayableReason("   ")).toBe("Playback failed");
    expect(normalizeUnplayableReason(undefined)).toBe("Playback failed");
    expect(normalizeUnplayableReason(null)).toBe("Playback failed");
  });
});

describe("UnplayableTracker", () => {
  it("reports a change only for newly marked tracks", () => {
    const tracker = new UnplayableTracker();
    expect(tracker.mark("/m/a.mp3", "Decoder error")).toBe(true);
    expect(tracker.mark("/m/a.mp3", "File not found")).toBe(false);
    expect(tracker.reason("/m/a.mp3")).toBe("File not found");
    expect(tracker.size()).toBe(1);
  });

  it("matches marks through canonical keys", () => {
    const tracker = new UnplayableTracker();
    tracker.mark("/m/Cafe\u0301.mp3");
    expect(tracker.isUnplayableKey("/m/Caf\u00e9.mp3")).toBe(true);
    expect(tracker.reason("/m/./Cafe\u0301.mp3")).toBe("Playback failed");
  });

  it("clears one or all marks", () => {
    const tracker = new UnplayableTracker();
    tracker.mark("/m/a.mp3");
    tracker.mark("/m/b.mp3");

    expect(tracker.clear("/m/a.mp3")).toBe(true);
    expect(tracker.clear("/m/a.mp3")).toBe(false);
    expect(tracker.entries()).toEqual([["/m/b.mp3", "Playback failed"]]);
    expect(tracker.clearAll()).toBe(true);
    expect(tracker.clearAll()).toBe(false);
  });
});
