import { randomUUID } from "node:crypto";
import { PLAYLISTS_FORMAT_VERSION, UNTITLED_PLAYLIST_NAME } from "../../shared/constants.js";
import type { UserPlaylist, UserPlaylistTrack } from "../../shared/types.js";
import { isRecord, JsonFile } from "./json-file.js";
import { canonicalKey, legacyKeys, lookupKeys } from "./path-key.js";
import { filterExistingFiles } from "./path-utils.js";
import { PersistenceLogger } from "./persistence-logger.js";
import type { PlaylistMemberSource } from "./scope-resolver.js";

function toPlaylist(raw: unknown): UserPlaylist | null {
  if (!isRecord(raw) || typeof raw.id !== "string" || raw.id.length === 0) {
    return null;
  }

  const tracks: UserPlaylistTrack[] = Array.isArray(raw.tracks)
    ? raw.tracks
      .map((track) => (isRecord(track) && typeof track.path === "string" ? track.path : ""))
      .filter((trackPath) => trackPath.length > 0)
      .map((trackPath) => ({ path: trackPath }))
    : [];

  const now = Date.now();
  return {
    id: raw.id,
    name: typeof raw.name === "string" && raw.name.trim().length > 0 ? raw.name : UNTITLED_PLAYLIST_NAME,
    tracks,
    createdAt: typeof raw.createdAt === "number" && Number.isFinite(raw.createdAt) ? raw.createdAt : now,
    updatedAt: typeof raw.updatedAt === "number" && Number.isFinite(raw.updatedAt) ? raw.updatedAt : now
  };
}

function normalizeTracks(paths: readonly string[]): UserPlaylistTrack[] {
  const seen = new Set<string>();
  const results: UserPlaylistTrack[] = [];
  for (const trackPath of paths) {
    const key = canonicalKey(trackPath);
    if (key.length === 0 || seen.has(key)) {
      continue;
    }
    seen.add(key);
    results.push({ path: key });
  }
  return results;
}

/** User-curated playlists. Track order is the playlist's authoritative order. */
export class PlaylistsStore implements PlaylistMemberSource {
  private readonly file: JsonFile;
  private readonly logger: PersistenceLogger;
  private playlists: UserPlaylist[] = [];

  public constructor(filePath: string, logger: PersistenceLogger = new PersistenceLogger()) {
    this.file = new JsonFile(filePath);
    this.logger = logger;
  }

  public async load(): Promise<void> {
    const parsed = await this.file.read();
    if (!isRecord(parsed) || parsed.version !== PLAYLISTS_FORMAT_VERSION || !Array.isArray(parsed.playlists)) {
      return;
    }

    this.playlists = parsed.playlists
      .map((entry) => toPlaylist(entry))
      .filter((entry): entry is UserPlaylist => entry !== null);
  }

  public list(): readonly UserPlaylist[] {
    return this.playlists;
  }

  public playlist(playlistId: string): UserPlaylist | null {
    return this.playlists.find((entry) => entry.id === playlistId) ?? null;
  }

  public async membersInOrder(playlistId: string): Promise<string[] | null> {
    const target = this.playlist(playlistId);
    if (!target) {
      return null;
    }
    return filterExistingFiles(target.tracks.map((track) => track.path));
  }

  public async createPlaylist(name: string, paths: string[] = []): Promise<UserPlaylist> {
    const trimmed = name.trim();
    const now = Date.now();
    const created: UserPlaylist = {
      id: randomUUID(),
      name: trimmed.length > 0 ? trimmed : UNTITLED_PLAYLIST_NAME,
      tracks: normalizeTracks(paths),
      createdAt: now,
      updatedAt: now
    };
    this.playlists.unshift(created);
    await this.save();
    return created;
  }

  public async renamePlaylist(playlistId: string, name: string): Promise<boolean> {
    const target = this.playlist(playlistId);
    const trimmed = name.trim();
    if (!target || trimmed.length === 0 || trimmed === target.name) {
      return false;
    }

    target.name = trimmed;
    target.updatedAt = Date.now();
    await this.save();
    return true;
  }

  public async deletePlaylist(playlistId: string): Promise<boolean> {
    const before = this.playlists.length;
    this.playlists = this.playlists.filter((entry) => entry.id !== playlistId);
    if (this.playlists.length === before) {
      return false;
    }
    await this.save();
    return true;
  }

  /** Appends tracks not already present by canonical or legacy key. Returns what was added. */
  public async addTracks(playlistId: string, paths: string[]): Promise<UserPlaylistTrack[]> {
    const target = this.playlist(playlistId);
    if (!target) {
      return [];
    }

    const existing = new Set<string>();
    for (const track of target.tracks) {
      existing.add(canonicalKey(track.path));
      for (const legacy of legacyKeys(track.path)) {
        existing.add(legacy);
      }
    }

    const appended: UserPlaylistTrack[] = [];
    for (const track of normalizeTracks(paths)) {
      const keys = [track.path, ...legacyKeys(track.path)];
      if (keys.some((key) => existing.has(key))) {
        continue;
      }
      keys.forEach((key) => existing.add(key));
      appended.push(track);
    }

    if (appended.length === 0) {
      return appended;
    }

    target.tracks.push(...appended);
    target.updatedAt = Date.now();
    await this.save();
    return appended;
  }

  public async removeTrack(playlistId: string, trackPath: string): Promise<boolean> {
    const target = this.playlist(playlistId);
    if (!target) {
      return false;
    }

    const targetKeys = new Set(lookupKeys(trackPath));
    const before = target.tracks.length;
    target.tracks = target.tracks.filter((track) => !lookupKeys(track.path).some((key) => targetKeys.has(key)));
    if (target.tracks.length === before) {
      return false;
    }

    target.updatedAt = Date.now();
    await this.save();
    return true;
  }

  private async save(): Promise<void> {
    try {
      await this.file.write({
        version: PLAYLISTS_FORMAT_VERSION,
        playlists: this.playlists
      });
    } catch (error) {
      this.logger.reportWriteFailure("playlists", error);
    }
  }
}
