import { EventEmitter } from "node:events";
import { WEIGHT_MULTIPLIERS, WEIGHTS_FORMAT_VERSION } from "../../shared/constants.js";
import type { PersistedWeights, PlaybackScope, WeightLevel, WeightSyncResult } from "../../shared/types.js";
import { isRecord, JsonFile } from "./json-file.js";
import { canonicalKey, deleteKeyVariants, findByLookupKeys, lookupKeys, migrateLookupHit } from "./path-key.js";
import { PersistenceLogger } from "./persistence-logger.js";

export interface WeightMutation {
  changed: boolean;
  revision: number;
}

export interface WeightStoreOptions {
  filePath: string;
  flushDelayMs?: number;
  logger?: PersistenceLogger;
}

type LevelMap = Map<string, number>;

export function clampLevel(raw: number): WeightLevel {
  if (!Number.isFinite(raw)) {
    return 0;
  }
  const level = Math.min(4, Math.max(0, Math.trunc(raw)));
  switch (level) {
    case 1:
      return 1;
    case 2:
      return 2;
    case 3:
      return 3;
    case 4:
      return 4;
    default:
      return 0;
  }
}

export function multiplierForLevel(level: WeightLevel): number {
  return WEIGHT_MULTIPLIERS[level];
}

/**
 * Canonicalizes keys and drops default or out-of-range levels. `dirty` reports whether the
 * input needed any of that, so the caller can write the cleaned form back.
 */
export function normalizeLevelRecord(raw: unknown): { levels: LevelMap; dirty: boolean } {
  const levels: LevelMap = new Map();
  if (!isRecord(raw)) {
    return { levels, dirty: raw !== undefined };
  }

  let dirty = false;
  for (const [rawKey, rawLevel] of Object.entries(raw)) {
    const key = canonicalKey(rawKey);
    const level = typeof rawLevel === "number" ? clampLevel(rawLevel) : 0;
    if (key !== rawKey || level !== rawLevel) {
      dirty = true;
    }
    if (level !== 0 && key.length > 0) {
      levels.set(key, level);
    }
  }
  return { levels, dirty };
}

/**
 * Per-scope weight levels keyed by canonical path. Level 0 is never stored. Queue and
 * playlist namespaces never share entries.
 */
export class WeightStore {
  private readonly file: JsonFile;
  private readonly flushDelayMs: number;
  private readonly logger: PersistenceLogger;
  private readonly events = new EventEmitter();
  private queueLevels: LevelMap = new Map();
  private playlistLevels = new Map<string, LevelMap>();
  private revision = 0;
  private saveTimer: NodeJS.Timeout | null = null;
  private loading: Promise<void> | null = null;
  private pendingEdits: Array<() => void> | null = null;

  public constructor(options: WeightStoreOptions) {
    this.file = new JsonFile(options.filePath);
    this.flushDelayMs = Math.max(0, options.flushDelayMs ?? 500);
    this.logger = options.logger ?? new PersistenceLogger();
  }

  public load(): Promise<void> {
    if (!this.loading) {
      this.loading = this.readAndMerge().finally(() => {
        this.loading = null;
      });
    }
    return this.loading;
  }

  private async readAndMerge(): Promise<void> {
    const edits: Array<() => void> = [];
    this.pendingEdits = edits;
    let parsed: unknown = null;
    try {
      parsed = await this.file.read();
    } finally {
      this.pendingEdits = null;
    }

    if (!isRecord(parsed) || parsed.version !== WEIGHTS_FORMAT_VERSION) {
      if (parsed !== null) {
        this.logger.warn(`Ignoring unreadable weights file ${this.file.getPath()}`);
      }
      return;
    }

    const queue = normalizeLevelRecord(parsed.queueLevels);
    let dirty = queue.dirty;
    const playlists = new Map<string, LevelMap>();

    if (isRecord(parsed.playlistLevels)) {
      for (const [playlistId, raw] of Object.entries(parsed.playlistLevels)) {
        const normalized = normalizeLevelRecord(raw);
        dirty = dirty || normalized.dirty;
        if (normalized.levels.size > 0) {
          playlists.set(playlistId, normalized.levels);
        } else {
          dirty = true;
        }
      }
    } else {
      dirty = true;
    }

    this.queueLevels = queue.levels;
    this.playlistLevels = playlists;

    if (edits.length > 0) {
      // edits made during the read go on top of what was on disk
      for (const edit of edits) {
        edit();
      }
      this.revision += 1;
      this.events.emit("change", { revision: this.revision });
      dirty = true;
    }

    if (dirty) {
      this.scheduleSave();
    }
  }

  public getRevision(): number {
    return this.revision;
  }

  public level(filePath: string, scope: PlaybackScope): WeightLevel {
    const map = this.mapFor(scope, false);
    if (!map) {
      return 0;
    }

    const hit = findByLookupKeys(map, filePath);
    if (!hit) {
      return 0;
    }

    if (migrateLookupHit(map, hit)) {
      this.scheduleSave();
    }
    return clampLevel(hit.value);
  }

  public multiplier(filePath: string, scope: PlaybackScope): number {
    return multiplierForLevel(this.level(filePath, scope));
  }

  public setLevel(rawLevel: number, filePath: string, scope: PlaybackScope): WeightMutation {
    const level = clampLevel(rawLevel);
    return this.commit(
      this.edit(() => this.applyLevel(level, filePath, scope)),
      false
    );
  }

  public clear(scope: PlaybackScope): WeightMutation {
    const changed = this.edit(() => {
      if (scope.kind === "playlist") {
        return this.playlistLevels.delete(scope.playlistId);
      }
      const had = this.queueLevels.size > 0;
      this.queueLevels.clear();
      return had;
    });
    return this.commit(changed, true);
  }

  public removeTrack(filePath: string, playlistId: string): WeightMutation {
    const changed = this.edit(() => {
      const map = this.playlistLevels.get(playlistId);
      const removed = map ? deleteKeyVariants(map, filePath) : false;
      this.dropEmptyPlaylist({ kind: "playlist", playlistId });
      return removed;
    });
    return this.commit(changed, true);
  }

  public removePlaylist(playlistId: string): WeightMutation {
    return this.commit(
      this.edit(() => this.playlistLevels.delete(playlistId)),
      true
    );
  }

  /**
   * Copies non-default playlist levels into the queue scope. Queue entries the playlist
   * leaves at default are untouched.
   */
  public syncOverridesToQueue(playlistId: string): WeightSyncResult {
    let result: WeightSyncResult = { total: 0, changed: 0 };
    const changed = this.edit(() => {
      result = this.copyOverrides(playlistId);
      return result.changed > 0;
    });
    this.commit(changed, false);
    return result;
  }

  /** True when the scope holds an entry under exactly this key (no legacy fallback). */
  public hasEntry(key: string, scope: PlaybackScope): boolean {
    return this.mapFor(scope, false)?.has(key) ?? false;
  }

  public entryCount(scope: PlaybackScope): number {
    return this.mapFor(scope, false)?.size ?? 0;
  }

  public snapshot(): PersistedWeights {
    const playlistLevels: Record<string, Record<string, number>> = {};
    for (const [playlistId, levels] of this.playlistLevels) {
      playlistLevels[playlistId] = Object.fromEntries(levels);
    }
    return {
      version: WEIGHTS_FORMAT_VERSION,
      queueLevels: Object.fromEntries(this.queueLevels),
      playlistLevels
    };
  }

  public subscribe(listener: (change: { revision: number }) => void): () => void {
    this.events.on("change", listener);
    return () => {
      this.events.off("change", listener);
    };
  }

  /** Writes pending changes now. Failures are logged and reported, never thrown. */
  public async flush(): Promise<void> {
    if (this.loading) {
      await this.loading;
    }
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
      this.saveTimer = null;
    }

    try {
      await this.file.write(this.snapshot());
    } catch (error) {
      this.logger.reportWriteFailure("playback weights", error);
    }
  }

  public async close(): Promise<void> {
    if (this.saveTimer) {
      await this.flush();
    }
  }

  /** Runs an edit now and, while a load is reading the file, keeps it for replay. */
  private edit(apply: () => boolean): boolean {
    this.pendingEdits?.push(() => {
      apply();
    });
    return apply();
  }

  private applyLevel(level: WeightLevel, filePath: string, scope: PlaybackScope): boolean {
    if (level === 0) {
      const map = this.mapFor(scope, false);
      if (!map) {
        return false;
      }
      const changed = deleteKeyVariants(map, filePath);
      this.dropEmptyPlaylist(scope);
      return changed;
    }

    const map = this.mapFor(scope, true);
    if (!map) {
      return false;
    }
    const key = canonicalKey(filePath);
    let changed = false;
    if (map.get(key) !== level) {
      map.set(key, level);
      changed = true;
    }
    for (const variant of lookupKeys(filePath).slice(1)) {
      if (map.delete(variant)) {
        changed = true;
      }
    }
    return changed;
  }

  private copyOverrides(playlistId: string): WeightSyncResult {
    const source = this.playlistLevels.get(playlistId);
    if (!source || source.size === 0) {
      return { total: 0, changed: 0 };
    }

    let changed = 0;
    for (const [key, raw] of source) {
      const level = clampLevel(raw);
      if (level === 0) {
        continue;
      }
      if (this.queueLevels.get(key) !== level) {
        this.queueLevels.set(key, level);
        changed += 1;
      }
    }
    return { total: source.size, changed };
  }

  private commit(changed: boolean, flushNow: boolean): WeightMutation {
    if (!changed) {
      return { changed: false, revision: this.revision };
    }

    this.revision += 1;
    this.events.emit("change", { revision: this.revision });

    if (flushNow) {
      void this.flush();
    } else {
      this.scheduleSave();
    }
    return { changed: true, revision: this.revision };
  }

  private scheduleSave(): void {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
    }
    this.saveTimer = setTimeout(() => {
      this.saveTimer = null;
      void this.flush();
    }, this.flushDelayMs);
  }

  private mapFor(scope: PlaybackScope, create: boolean): LevelMap | null {
    if (scope.kind === "queue") {
      return this.queueLevels;
    }

    const existing = this.playlistLevels.get(scope.playlistId);
    if (existing || !create) {
      return existing ?? null;
    }

    const created: LevelMap = new Map();
    this.playlistLevels.set(scope.playlistId, created);
    return created;
  }

  private dropEmptyPlaylist(scope: PlaybackScope): void {
    if (scope.kind === "playlist" && this.playlistLevels.get(scope.playlistId)?.size === 0) {
      this.playlistLevels.delete(scope.playlistId);
    }
  }
}
