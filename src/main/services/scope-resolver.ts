import type { PersistedScopeSelection, PlaybackScope } from "../../shared/types.js";
import { canonicalKey, lookupKeys } from "./path-key.js";
import type { QueueManager } from "./queue-manager.js";
import type { ScopeStore } from "./scope-store.js";
import type { UnplayableTracker } from "./unplayable-tracker.js";

/** What a scope operation did to the population the shuffle state was built from. */
export type ScopeChange =
  | { type: "none" }
  | { type: "replaced"; scope: PlaybackScope }
  | { type: "members"; added: string[]; removed: string[] };

export interface PlaylistMemberSource {
  /** Member paths in playlist order, existing files only; `null` for an unknown playlist. */
  membersInOrder(playlistId: string): Promise<string[] | null>;
}

export interface ScopeResolverOptions {
  queue: QueueManager;
  unplayable: UnplayableTracker;
  store?: ScopeStore;
}

function dedupeKeys(paths: readonly string[]): string[] {
  const seen = new Set<string>();
  const keys: string[] = [];
  for (const filePath of paths) {
    const key = canonicalKey(filePath);
    if (key.length === 0 || seen.has(key)) {
      continue;
    }
    seen.add(key);
    keys.push(key);
  }
  return keys;
}

export class ScopeResolver {
  private readonly queue: QueueManager;
  private readonly unplayable: UnplayableTracker;
  private readonly store: ScopeStore | null;
  private scope: PlaybackScope = { kind: "queue" };
  private trackKeys: string[] = [];
  private positionByKey = new Map<string, number>();
  private generation = 0;
  private pendingSave: Promise<void> = Promise.resolve();

  public constructor(options: ScopeResolverOptions) {
    this.queue = options.queue;
    this.unplayable = options.unplayable;
    this.store = options.store ?? null;
  }

  public currentScope(): PlaybackScope {
    return this.scope.kind === "queue" ? { kind: "queue" } : { kind: "playlist", playlistId: this.scope.playlistId };
  }

  /** Bumped on every scope switch; async work tagged with an older value is stale. */
  public getGeneration(): number {
    return this.generation;
  }

  public isPlaylistActive(playlistId: string): boolean {
    return this.scope.kind === "playlist" && this.scope.playlistId === playlistId;
  }

  public setScopeQueue(): ScopeChange {
    const wasPlaylist = this.scope.kind === "playlist";
    this.scope = { kind: "queue" };
    this.trackKeys = [];
    this.positionByKey.clear();
    this.generation += 1;
    this.persist();
    return wasPlaylist ? { type: "replaced", scope: this.currentScope() } : { type: "none" };
  }

  public setScopePlaylist(playlistId: string, orderedMemberPaths: readonly string[]): ScopeChange {
    this.scope = { kind: "playlist", playlistId };
    this.trackKeys = dedupeKeys(orderedMemberPaths);
    this.rebuildPositions();
    this.generation += 1;
    this.persist();
    return { type: "replaced", scope: this.currentScope() };
  }

  /** Replaces the member list of the active playlist and reports the key delta. */
  public updateScopeMembersIfActive(playlistId: string, orderedMemberPaths: readonly string[]): ScopeChange {
    if (!this.isPlaylistActive(playlistId)) {
      return { type: "none" };
    }

    const oldKeys = new Set(this.trackKeys);
    const newKeys = dedupeKeys(orderedMemberPaths);
    const newSet = new Set(newKeys);

    this.trackKeys = newKeys;
    this.rebuildPositions();

    const added = newKeys.filter((key) => !oldKeys.has(key));
    const removed = [...oldKeys].filter((key) => !newSet.has(key));
    if (added.length === 0 && removed.length === 0) {
      return { type: "none" };
    }
    return { type: "members", added, removed };
  }

  /**
   * Re-derives the scope from a persisted selection. A playlist that is gone or has no
   * existing members falls back to the queue. `onMembersResolved` runs right before the
   * playlist becomes active, so the caller can make its members resolvable first. If the
   * scope is switched while members are being resolved, the result is dropped.
   */
  public async restore(
    selection: PersistedScopeSelection | null,
    members: PlaylistMemberSource,
    onMembersResolved?: (paths: string[]) => void
  ): Promise<ScopeChange> {
    if (!selection) {
      return { type: "none" };
    }

    if (selection.kind === "queue") {
      return this.setScopeQueue();
    }

    const generation = this.generation;
    const paths = await members.membersInOrder(selection.playlistID);
    if (generation !== this.generation) {
      return { type: "none" };
    }

    if (!paths || paths.length === 0) {
      return this.setScopeQueue();
    }

    onMembersResolved?.(paths);
    return this.setScopePlaylist(selection.playlistID, paths);
  }

  /** Position of `key` in the active playlist's order. */
  public currentPosition(key: string | null): number | null {
    if (key === null || this.scope.kind !== "playlist") {
      return null;
    }
    for (const candidate of lookupKeys(key)) {
      const position = this.positionByKey.get(candidate);
      if (position !== undefined) {
        return position;
      }
    }
    return null;
  }

  /** Candidate keys in scope order. */
  public population(): string[] {
    return this.scope.kind === "queue" ? this.queue.keys() : [...this.trackKeys];
  }

  public isPlayable(key: string): boolean {
    const record = this.queue.recordForKey(key);
    if (!record) {
      return false;
    }
    return !this.unplayable.isUnplayableKey(record.key) && !this.unplayable.isUnplayableKey(key);
  }

  public playableCount(): number {
    return this.population().reduce((count, key) => count + (this.isPlayable(key) ? 1 : 0), 0);
  }

  public async flush(): Promise<void> {
    await this.pendingSave;
  }

  private persist(): void {
    const store = this.store;
    if (!store) {
      return;
    }
    const scope = this.currentScope();
    this.pendingSave = this.pendingSave.then(() => store.save(scope));
  }

  private rebuildPositions(): void {
    this.positionByKey.clear();
    this.trackKeys.forEach((key, index) => {
      if (!this.positionByKey.has(key)) {
        this.positionByKey.set(key, index);
      }
    });
  }
}
