import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PersistenceLogger } from "../src/main/services/persistence-logger.js";
import { QueueManager } from "../src/main/services/queue-manager.js";
import { ScopeResolver, type PlaylistMemberSource } from "../src/main/services/scope-resolver.js";
import { ScopeStore } from "../src/main/services/scope-store.js";
import { UnplayableTracker } from "../src/main/services/unplayable-tracker.js";
import { makeTempDir, readJson, removeDir } from "./support.js";

function members(byId: Record<string, string[]>): PlaylistMemberSource {
  return {
    membersInOrder: async (playlistId) => byId[playlistId] ?? null
  };
}

describe("ScopeResolver", () => {
  let queue: QueueManager;
  let unplayable: UnplayableTracker;
  let resolver: ScopeResolver;

  beforeEach(() => {
    queue = new QueueManager();
    unplayable = new UnplayableTracker();
    queue.addPaths(["/m/a.mp3", "/m/b.mp3", "/m/c.mp3"]);
    resolver = new ScopeResolver({ queue, unplayable });
  });

  it("uses the physical order in queue scope", () => {
    expect(resolver.currentScope()).toEqual({ kind: "queue" });
    expect(resolver.population()).toEqual(["/m/a.mp3", "/m/b.mp3", "/m/c.mp3"]);
  });

  it("reports replacement only when the scope really changes", () => {
    expect(resolver.setScopeQueue()).toEqual({ type: "none" });
    expect(resolver.setScopePlaylist("mix", ["/m/c.mp3"])).toEqual({
      type: "replaced",
      scope: { kind: "playlist", playlistId: "mix" }
    });
    expect(resolver.setScopeQueue()).toEqual({ type: "replaced", scope: { kind: "queue" } });
  });

  it("dedupes playlist members and keeps their order", () => {
    resolver.setScopePlaylist("mix", ["/m/c.mp3", "/m/a.mp3", "/m/./c.mp3"]);
    expect(resolver.population()).toEqual(["/m/c.mp3", "/m/a.mp3"]);
    expect(resolver.currentPosition("/m/a.mp3")).toBe(1);
    expect(resolver.currentPosition("/m/b.mp3")).toBeNull();
  });

  it("finds positions through canonicalization", () => {
    queue.addPaths(["/m/Cafe\u0301.mp3"]);
    resolver.setScopePlaylist("mix", ["/m/Cafe\u0301.mp3"]);
    expect(resolver.currentPosition("/m/Caf\u00e9.mp3")).toBe(0);
  });

  it("has no position in queue scope", () => {
    expect(resolver.currentPosition("/m/a.mp3")).toBeNull();
  });

  it("reports the member delta of the active playlist", () => {
    resolver.setScopePlaylist("mix", ["/m/a.mp3", "/m/b.mp3"]);
    expect(resolver.updateScopeMembersIfActive("mix", ["/m/b.mp3", "/m/c.mp3"])).toEqual({
      type: "members",
      added: ["/m/c.mp3"],
      removed: ["/m/a.mp3"]
    });
    expect(resolver.updateScopeMembersIfActive("mix", ["/m/b.mp3", "/m/c.mp3"])).toEqual({ type: "none" });
    expect(resolver.updateScopeMembersIfActive("other", ["/m/a.mp3"])).toEqual({ type: "none" });
  });

  it("treats unresolvable and unplayable keys as not playable", () => {
    resolver.setScopePlaylist("mix", ["/m/a.mp3", "/m/b.mp3", "/m/gone.mp3"]);
    unplayable.mark("/m/b.mp3", "Decoder error");
    expect(resolver.isPlayable("/m/a.mp3")).toBe(true);
    expect(resolver.isPlayable("/m/b.mp3")).toBe(false);
    expect(resolver.isPlayable("/m/gone.mp3")).toBe(false);
    expect(resolver.playableCount()).toBe(1);
  });

  it("bumps the generation on every switch", () => {
    const start = resolver.getGeneration();
    resolver.setScopePlaylist("mix", ["/m/a.mp3"]);
    resolver.setScopeQueue();
    expect(resolver.getGeneration()).toBe(start + 2);
  });

  describe("restore", () => {
    it("does nothing without a saved selection", async () => {
      expect(await resolver.restore(null, members({}))).toEqual({ type: "none" });
    });

    it("activates the saved playlist after resolving its members", async () => {
      const resolved: string[][] = [];
      const change = await resolver.restore(
        { kind: "playlist", playlistID: "mix" },
        members({ mix: ["/m/b.mp3", "/m/a.mp3"] }),
        (paths) => resolved.push(paths)
      );

      expect(change.type).toBe("replaced");
      expect(resolved).toEqual([["/m/b.mp3", "/m/a.mp3"]]);
      expect(resolver.population()).toEqual(["/m/b.mp3", "/m/a.mp3"]);
    });

    it("falls back to the queue for a missing or empty playlist", async () => {
      resolver.setScopePlaylist("mix", ["/m/a.mp3"]);
      expect(await resolver.restore({ kind: "playlist", playlistID: "gone" }, members({}))).toEqual({
        type: "replaced",
        scope: { kind: "queue" }
      });

      resolver.setScopePlaylist("mix", ["/m/a.mp3"]);
      await resolver.restore({ kind: "playlist", playlistID: "empty" }, members({ empty: [] }));
      expect(resolver.currentScope()).toEqual({ kind: "queue" });
    });

    it("drops the result when the scope switches while members resolve", async () => {
      let release: (paths: string[]) => void = () => undefined;
      const slow: PlaylistMemberSource = {
        membersInOrder: () => new Promise<string[]>((resolve) => {
          release = resolve;
        })
      };

      const pending = resolver.restore({ kind: "playlist", playlistID: "mix" }, slow);
      resolver.setScopePlaylist("other", ["/m/c.mp3"]);
      release(["/m/a.mp3"]);

      expect(await pending).toEqual({ type: "none" });
      expect(resolver.currentScope()).toEqual({ kind: "playlist", playlistId: "other" });
    });
  });
});

describe("ScopeResolver persistence", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("saves the selector on every switch", async () => {
    const filePath = path.join(dir, "playback-scope.json");
    const store = new ScopeStore(filePath, new PersistenceLogger(false));
    const resolver = new ScopeResolver({ queue: new QueueManager(), unplayable: new UnplayableTracker(), store });

    resolver.setScopePlaylist("mix", ["/m/a.mp3"]);
    await resolver.flush();
    expect(await readJson(filePath)).toEqual({ kind: "playlist", playlistID: "mix" });

    resolver.setScopeQueue();
    await resolver.flush();
    expect(await store.load()).toEqual({ kind: "queue" });
  });

  it("loads nothing from a malformed selector", async () => {
    const store = new ScopeStore(path.join(dir, "missing.json"), new PersistenceLogger(false));
    expect(await store.load()).toBeNull();
  });
});
