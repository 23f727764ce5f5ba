import path from "node:path";
import { promises as fs } from "node:fs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PersistenceLogger } from "../src/main/services/persistence-logger.js";
import { PlaylistsStore } from "../src/main/services/playlists-store.js";
import { makeTempDir, removeDir, touchFiles } from "./support.js";

describe("PlaylistsStore", () => {
  let dir: string;
  let filePath: string;
  let store: PlaylistsStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    filePath = path.join(dir, "user-playlists.json");
    store = new PlaylistsStore(filePath, new PersistenceLogger(false));
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("creates playlists newest first with deduplicated tracks", async () => {
    const older = await store.createPlaylist("Older");
    const mix = await store.createPlaylist("  Mix  ", ["/m/a.mp3", "/m/./a.mp3", "/m/b.mp3"]);

    expect(store.list().map((entry) => entry.id)).toEqual([mix.id, older.id]);
    expect(mix.name).toBe("Mix");
    expect(mix.tracks).toEqual([{ path: "/m/a.mp3" }, { path: "/m/b.mp3" }]);
  });

  it("names blank playlists", async () => {
    expect((await store.createPlaylist("   ")).name).toBe("Untitled Playlist");
  });

  it("appends only tracks not already present under any key form", async () => {
    const mix = await store.createPlaylist("Mix", ["/m/Song.mp3"]);
    const appended = await store.addTracks(mix.id, ["/m/song.mp3", "/m/Other.mp3", "/m/Other.mp3"]);

    expect(appended).toEqual([{ path: "/m/Other.mp3" }]);
    expect(store.playlist(mix.id)?.tracks).toEqual([{ path: "/m/Song.mp3" }, { path: "/m/Other.mp3" }]);
    expect(await store.addTracks("missing", ["/m/a.mp3"])).toEqual([]);
  });

  it("removes tracks and renames", async () => {
    const mix = await store.createPlaylist("Mix", ["/m/a.mp3", "/m/b.mp3"]);

    expect(await store.removeTrack(mix.id, "/m/a.mp3")).toBe(true);
    expect(await store.removeTrack(mix.id, "/m/a.mp3")).toBe(false);
    expect(await store.renamePlaylist(mix.id, "Renamed")).toBe(true);
    expect(await store.renamePlaylist(mix.id, "Renamed")).toBe(false);
    expect(store.playlist(mix.id)).toMatchObject({ name: "Renamed", tracks: [{ path: "/m/b.mp3" }] });
  });

  it("resolves members that exist on disk, in order", async () => {
    const [first = "", second = ""] = await touchFiles(dir, ["one.mp3", "two.mp3"]);
    const mix = await store.createPlaylist("Mix", [second, path.join(dir, "gone.mp3"), first]);

    expect(await store.membersInOrder(mix.id)).toEqual([second, first]);
    expect(await store.membersInOrder("missing")).toBeNull();
  });

  it("reloads what it saved", async () => {
    const mix = await store.createPlaylist("Mix", ["/m/a.mp3"]);
    await store.deletePlaylist("missing");

    const reloaded = new PlaylistsStore(filePath, new PersistenceLogger(false));
    await reloaded.load();
    expect(reloaded.list()).toEqual([mix]);
  });

  it("skips malformed entries on load", async () => {
    await fs.writeFile(
      filePath,
      JSON.stringify({
        version: 1,
        playlists: [{ id: "p1", name: "Kept", tracks: [{ path: "/m/a.mp3" }, { nope: true }], createdAt: 1, updatedAt: 2 }, { name: "no id" }]
      })
    );
    await store.load();
    expect(store.list()).toEqual([
      { id: "p1", name: "Kept", tracks: [{ path: "/m/a.mp3" }], createdAt: 1, updatedAt: 2 }
    ]);
  });
});
