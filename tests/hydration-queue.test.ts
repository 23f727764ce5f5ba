import { describe, expect, it, vi } from "vitest";
import type { TrackMetadata } from "../src/shared/types.js";
import { HydrationQueue, type HydrationRequest } from "../src/main/services/hydration-queue.js";

function metadataFor(filePath: string): TrackMetadata {
  return { title: `tagged ${filePath}`, artist: "Artist", album: "Album", durationSec: 180 };
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

function requests(count: number): HydrationRequest[] {
  return Array.from({ length: count }, (_, index) => ({ trackId: `t${index}`, filePath: `/m/${index}.mp3` }));
}

describe("HydrationQueue", () => {
  it("never runs more loads than its concurrency", async () => {
    let active = 0;
    let peak = 0;
    const applied: string[] = [];
    const queue = new HydrationQueue({
      concurrency: 2,
      load: async (filePath) => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 1));
        active -= 1;
        return metadataFor(filePath);
      },
      apply: (request) => applied.push(request.trackId),
      onError: () => undefined
    });

    await queue.enqueueAll(requests(5));
    expect(peak).toBe(2);
    expect([...applied].sort()).toEqual(["t0", "t1", "t2", "t3", "t4"]);
    expect(queue.pendingCount()).toBe(0);
  });

  it("discards results of loads running when cancelled", async () => {
    const gate = deferred<TrackMetadata>();
    const apply = vi.fn();
    const queue = new HydrationQueue({
      concurrency: 1,
      load: () => gate.promise,
      apply,
      onError: () => undefined
    });

    const pending = queue.enqueue({ trackId: "t0", filePath: "/m/0.mp3" });
    queue.cancel();
    gate.resolve(metadataFor("/m/0.mp3"));
    await pending;

    expect(apply).not.toHaveBeenCalled();
  });

  it("drops queued work on cancel", async () => {
    const gate = deferred<TrackMetadata>();
    const load = vi.fn(() => gate.promise);
    const queue = new HydrationQueue({ concurrency: 1, load, apply: () => undefined, onError: () => undefined });

    const running = queue.enqueue({ trackId: "t0", filePath: "/m/0.mp3" });
    const queued = queue.enqueue({ trackId: "t1", filePath: "/m/1.mp3" });
    queue.cancel();
    await queued;
    gate.resolve(metadataFor("/m/0.mp3"));
    await running;

    expect(load).toHaveBeenCalledTimes(1);
  });

  it("hydrates a track again after a cancel instead of reusing the stale load", async () => {
    const gates = [deferred<TrackMetadata>(), deferred<TrackMetadata>()];
    let call = 0;
    const applied: string[] = [];
    const queue = new HydrationQueue({
      concurrency: 2,
      load: () => gates[call++]?.promise ?? Promise.reject(new Error("unexpected load")),
      apply: (_request, metadata) => applied.push(metadata.title),
      onError: () => undefined
    });

    const stale = queue.enqueue({ trackId: "t0", filePath: "/m/0.mp3" });
    queue.cancel();
    const fresh = queue.enqueue({ trackId: "t0", filePath: "/m/0.mp3" });
    gates[0]?.resolve(metadataFor("old"));
    gates[1]?.resolve(metadataFor("new"));
    await Promise.all([stale, fresh]);

    expect(applied).toEqual(["tagged new"]);
  });

  it("shares one load between duplicate requests", async () => {
    const load = vi.fn(async (filePath: string) => metadataFor(filePath));
    const queue = new HydrationQueue({ concurrency: 1, load, apply: () => undefined, onError: () => undefined });

    await Promise.all([
      queue.enqueue({ trackId: "t0", filePath: "/m/0.mp3" }),
      queue.enqueue({ trackId: "t0", filePath: "/m/0.mp3" })
    ]);
    expect(load).toHaveBeenCalledTimes(1);
  });

  it("reports failed loads", async () => {
    const failure = new Error("unreadable");
    const onError = vi.fn();
    const apply = vi.fn();
    const queue = new HydrationQueue({
      concurrency: 1,
      load: () => Promise.reject(failure),
      apply,
      onError
    });

    await queue.enqueue({ trackId: "t0", filePath: "/m/0.mp3" });
    expect(onError).toHaveBeenCalledWith({ trackId: "t0", filePath: "/m/0.mp3" }, failure);
    expect(apply).not.toHaveBeenCalled();
  });

  it("accepts nothing after shutdown", async () => {
    const load = vi.fn(async (filePath: string) => metadataFor(filePath));
    const queue = new HydrationQueue({ concurrency: 1, load, apply: () => undefined, onError: () => undefined });
    queue.shutdown();

    await queue.enqueue({ trackId: "t0", filePath: "/m/0.mp3" });
    expect(load).not.toHaveBeenCalled();
  });
});
