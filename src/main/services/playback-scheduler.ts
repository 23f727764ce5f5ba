import { EventEmitter } from "node:events";
import type {
  PlaybackFeedback,
  PlaybackMode,
  PlaybackScope,
  SchedulerEvent,
  TrackRecord,
  UserPlaylist,
  WeightLevel,
  WeightSyncResult
} from "../../shared/types.js";
import { describeScope } from "../../shared/format.js";
import { HydrationQueue } from "./hydration-queue.js";
import type { MetadataReader } from "./metadata-service.js";
import { filterExistingFiles } from "./path-utils.js";
import { PersistenceLogger } from "./persistence-logger.js";
import type { PlaylistsStore } from "./playlists-store.js";
import type { QueueManager } from "./queue-manager.js";
import type { ScopeChange, ScopeResolver } from "./scope-resolver.js";
import type { ScopeStore } from "./scope-store.js";
import type { SessionStore } from "./session-store.js";
import type { UnplayableTracker } from "./unplayable-tracker.js";
import { WeightedShuffle, type RandomSource } from "./weighted-shuffle.js";
import type { WeightMutation, WeightStore } from "./weight-store.js";

export interface PlaybackSchedulerDeps {
  queue: QueueManager;
  weights: WeightStore;
  unplayable: UnplayableTracker;
  scopes: ScopeResolver;
  playlists: PlaylistsStore;
  readMetadata: MetadataReader;
  session?: SessionStore;
  scopeStore?: ScopeStore;
  logger?: PersistenceLogger;
  hydrationConcurrency?: number;
  restoreScopeOnStartup?: boolean;
  random?: RandomSource;
}

/**
 * Decides which track plays next. Every call runs synchronously against committed
 * in-memory state; persistence happens behind it. All mutations of the collection, the
 * scope and the shuffle state go through this object so they stay in step.
 */
export class PlaybackScheduler {
  private readonly queue: QueueManager;
  private readonly weights: WeightStore;
  private readonly unplayable: UnplayableTracker;
  private readonly scopes: ScopeResolver;
  private readonly playlists: PlaylistsStore;
  private readonly session: SessionStore | null;
  private readonly scopeStore: ScopeStore | null;
  private readonly logger: PersistenceLogger;
  private readonly restoreScopeOnStartup: boolean;
  private readonly shuffle: WeightedShuffle;
  private readonly libraryHydration: HydrationQueue;
  private readonly scopeHydration: HydrationQueue;
  private readonly events = new EventEmitter();
  private readonly unsubscribers: Array<() => void> = [];
  private currentKey: string | null = null;
  private shuffleRevision: number;
  private scopeRequestId = 0;
  private shutdownPromise: Promise<void> | null = null;

  public constructor(deps: PlaybackSchedulerDeps) {
    this.queue = deps.queue;
    this.weights = deps.weights;
    this.unplayable = deps.unplayable;
    this.scopes = deps.scopes;
    this.playlists = deps.playlists;
    this.session = deps.session ?? null;
    this.scopeStore = deps.scopeStore ?? null;
    this.logger = deps.logger ?? new PersistenceLogger();
    this.restoreScopeOnStartup = deps.restoreScopeOnStartup ?? true;
    this.shuffleRevision = this.weights.getRevision();

    this.shuffle = new WeightedShuffle(
      {
        population: () => this.scopes.population(),
        weightOf: (key) => this.weights.multiplier(key, this.scopes.currentScope()),
        isPlayable: (key) => this.scopes.isPlayable(key)
      },
      deps.random
    );

    const hydrationOptions = {
      concurrency: deps.hydrationConcurrency ?? 4,
      load: deps.readMetadata,
      apply: (request: { trackId: string }, metadata: TrackRecord["metadata"]) => {
        this.queue.updateMetadata(request.trackId, metadata);
      },
      onError: (request: { filePath: string }, error: unknown) => {
        this.logger.error(`Metadata hydration failed for ${request.filePath}`, error);
      }
    };
    this.libraryHydration = new HydrationQueue(hydrationOptions);
    this.scopeHydration = new HydrationQueue(hydrationOptions);

    this.unsubscribers.push(
      this.weights.subscribe(({ revision }) => {
        this.emit({ type: "weights.changed", payload: { revision } });
      }),
      this.logger.subscribe((notice) => {
        this.emit({ type: "persistence.error", payload: notice });
      })
    );
  }

  public async init(): Promise<void> {
    await Promise.all([this.weights.load(), this.playlists.load()]);

    const session = this.session ? await this.session.load() : null;
    if (session) {
      const existing = await filterExistingFiles(session.queuePaths);
      const inserted = this.queue.addPaths(existing);
      this.onQueueAppended(inserted, this.libraryHydration);
      if (session.currentTrackPath) {
        this.currentKey = this.queue.recordForKey(session.currentTrackPath)?.key ?? null;
      }
      this.logger.debug(`Restored ${inserted.length} of ${session.queuePaths.length} queued tracks`);
    }

    if (this.restoreScopeOnStartup && this.scopeStore) {
      const selection = await this.scopeStore.load();
      const change = await this.scopes.restore(selection, this.playlists, (paths) => {
        this.ensureMembersInQueue(paths);
      });
      this.applyScopeChange(change);
    }
  }

  public subscribe(listener: (event: SchedulerEvent) => void): () => void {
    this.events.on("event", listener);
    return () => {
      this.events.off("event", listener);
    };
  }

  // Selection

  public next(mode: PlaybackMode): TrackRecord | null {
    if (mode === "random") {
      this.ensureShuffleCurrent();
      return this.selectKey(this.shuffle.next(this.currentKey));
    }
    return this.select(this.sequentialCandidate(1));
  }

  public previous(mode: PlaybackMode): TrackRecord | null {
    if (mode === "random") {
      this.ensureShuffleCurrent();
      return this.selectKey(this.shuffle.previous());
    }
    return this.select(this.sequentialCandidate(-1));
  }

  /** The track `next(mode)` would return, leaving the current pointer where it is. */
  public peekNext(mode: PlaybackMode): TrackRecord | null {
    if (mode === "random") {
      this.ensureShuffleCurrent();
      return this.recordFor(this.shuffle.peek(this.currentKey));
    }
    return this.sequentialCandidate(1);
  }

  /** Selects by position in the active scope's order. */
  public selectAt(position: number): TrackRecord | null {
    if (!Number.isInteger(position) || position < 0) {
      return null;
    }
    const key = this.scopes.population()[position];
    return key === undefined ? null : this.selectKey(key);
  }

  public randomFirst(): TrackRecord | null {
    this.ensureShuffleCurrent();
    return this.selectKey(this.shuffle.randomStart());
  }

  public randomExcludingCurrent(): TrackRecord | null {
    return this.selectKey(this.shuffle.randomExcludingCurrent(this.currentKey));
  }

  public currentTrack(): TrackRecord | null {
    return this.recordFor(this.currentKey);
  }

  public playableCount(): number {
    return this.scopes.playableCount();
  }

  // Scope

  public currentScope(): PlaybackScope {
    return this.scopes.currentScope();
  }

  public setScopeQueue(): void {
    this.scopeRequestId += 1;
    this.scopeHydration.cancel();
    this.applyScopeChange(this.scopes.setScopeQueue());
  }

  /**
   * Activates a playlist scope. Resolves `false` when the playlist is unknown, has no
   * existing members, or another scope switch was requested while members were resolving.
   */
  public async setScopePlaylist(playlistId: string): Promise<boolean> {
    const requestId = ++this.scopeRequestId;
    this.scopeHydration.cancel();

    const paths = await this.playlists.membersInOrder(playlistId);
    if (requestId !== this.scopeRequestId || !paths || paths.length === 0) {
      return false;
    }

    this.ensureMembersInQueue(paths);
    this.applyScopeChange(this.scopes.setScopePlaylist(playlistId, paths));
    return true;
  }

  public async setScope(scope: PlaybackScope): Promise<boolean> {
    if (scope.kind === "queue") {
      this.setScopeQueue();
      return true;
    }
    return this.setScopePlaylist(scope.playlistId);
  }

  // Weights

  public weightLevel(filePath: string, scope: PlaybackScope = this.scopes.currentScope()): WeightLevel {
    return this.weights.level(filePath, scope);
  }

  public setWeightLevel(level: number, filePath: string, scope: PlaybackScope = this.scopes.currentScope()): boolean {
    return this.applyWeightMutation(this.weights.setLevel(level, filePath, scope));
  }

  public clearWeights(scope: PlaybackScope): boolean {
    return this.applyWeightMutation(this.weights.clear(scope));
  }

  public syncPlaylistWeightsToQueue(playlistId: string): WeightSyncResult {
    const result = this.weights.syncOverridesToQueue(playlistId);
    if (result.changed > 0) {
      this.invalidateShuffle();
    }
    return result;
  }

  // Unplayable tracks

  public reportPlaybackFailure(filePath: string, reason?: string): void {
    const previousReason = this.unplayable.reason(filePath);
    const changed = this.unplayable.mark(filePath, reason);
    if (changed) {
      this.invalidateShuffle();
    }
    const nextReason = this.unplayable.reason(filePath);
    if (!changed && nextReason === previousReason) {
      return;
    }
    const key = this.queue.recordForKey(filePath)?.key ?? filePath;
    this.emit({ type: "unplayable.changed", payload: { key, reason: nextReason } });
  }

  public reportPlaybackSuccess(filePath: string): void {
    if (this.unplayable.clear(filePath)) {
      this.invalidateShuffle();
      const key = this.queue.recordForKey(filePath)?.key ?? filePath;
      this.emit({ type: "unplayable.changed", payload: { key, reason: null } });
    }
  }

  public handlePlaybackFeedback(feedback: PlaybackFeedback): void {
    if (feedback.type === "failed") {
      this.reportPlaybackFailure(feedback.path, feedback.reason);
    } else {
      this.reportPlaybackSuccess(feedback.path);
    }
  }

  public clearAllUnplayable(): void {
    if (this.unplayable.clearAll()) {
      this.invalidateShuffle();
    }
  }

  public unplayableReason(filePath: string): string | null {
    return this.unplayable.reason(filePath);
  }

  // Collection

  public getQueue(): readonly TrackRecord[] {
    return this.queue.getItems();
  }

  public addTracks(paths: string[]): TrackRecord[] {
    const inserted = this.queue.addPaths(paths);
    this.onQueueAppended(inserted, this.libraryHydration);
    return inserted;
  }

  public async addFolder(rootPath: string): Promise<TrackRecord[]> {
    const inserted = await this.queue.addFolder(rootPath);
    this.onQueueAppended(inserted, this.libraryHydration);
    return inserted;
  }

  public removeTrack(filePath: string): boolean {
    const { removed, index } = this.queue.removeTrack(filePath);
    if (!removed) {
      return false;
    }

    this.unplayable.clear(removed.path);
    if (this.scopes.currentScope().kind === "queue") {
      this.shuffle.integrate([], [removed.key]);
    }

    if (this.currentKey === removed.key) {
      // step back so sequential next() lands on the track that took its place
      this.currentKey = index === 0 ? null : (this.queue.at(index - 1)?.key ?? null);
    }

    if (this.queue.size() === 0) {
      this.currentKey = null;
      this.setScopeQueue();
    }

    this.persistSession();
    return true;
  }

  public clearQueue(): void {
    this.queue.clear();
    this.unplayable.clearAll();
    this.libraryHydration.cancel();
    this.shuffle.reset();
    this.currentKey = null;
    this.setScopeQueue();
    this.persistSession();
  }

  // Playlists

  public listPlaylists(): readonly UserPlaylist[] {
    return this.playlists.list();
  }

  public async createPlaylist(name: string, paths: string[] = []): Promise<UserPlaylist> {
    return this.playlists.createPlaylist(name, paths);
  }

  public async renamePlaylist(playlistId: string, name: string): Promise<boolean> {
    return this.playlists.renamePlaylist(playlistId, name);
  }

  public async addTracksToPlaylist(playlistId: string, paths: string[]): Promise<number> {
    const appended = await this.playlists.addTracks(playlistId, paths);
    if (appended.length > 0) {
      await this.refreshActivePlaylist(playlistId);
    }
    return appended.length;
  }

  public async removeTrackFromPlaylist(playlistId: string, filePath: string): Promise<boolean> {
    const removed = await this.playlists.removeTrack(playlistId, filePath);
    if (!removed) {
      return false;
    }

    this.applyWeightMutation(this.weights.removeTrack(filePath, playlistId));
    await this.refreshActivePlaylist(playlistId);
    return true;
  }

  public async deletePlaylist(playlistId: string): Promise<boolean> {
    const deleted = await this.playlists.deletePlaylist(playlistId);
    if (!deleted) {
      return false;
    }

    this.applyWeightMutation(this.weights.removePlaylist(playlistId));
    if (this.scopes.isPlaylistActive(playlistId)) {
      this.setScopeQueue();
    }
    return true;
  }

  // Lifecycle

  public async shutdown(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.shutdownPromise = (async () => {
      this.libraryHydration.shutdown();
      this.scopeHydration.shutdown();
      this.persistSession();

      await Promise.all([
        this.weights.flush(),
        this.scopes.flush(),
        this.session?.flush() ?? Promise.resolve()
      ]);

      for (const unsubscribe of this.unsubscribers.splice(0)) {
        unsubscribe();
      }
    })();

    await this.shutdownPromise;
  }

  // Internals

  private sequentialCandidate(step: 1 | -1): TrackRecord | null {
    const population = this.scopes.population();
    const total = population.length;
    if (total === 0) {
      return null;
    }

    let position = this.currentPositionInScope() ?? (step === 1 ? -1 : 0);
    for (let attempts = 0; attempts < total; attempts += 1) {
      position = (position + step + total) % total;
      const key = population[position];
      if (key === undefined || !this.scopes.isPlayable(key)) {
        continue;
      }
      const record = this.queue.recordForKey(key);
      if (record) {
        return record;
      }
    }
    return null;
  }

  private currentPositionInScope(): number | null {
    if (this.currentKey === null) {
      return null;
    }
    return this.scopes.currentScope().kind === "queue"
      ? this.queue.indexOfKey(this.currentKey)
      : this.scopes.currentPosition(this.currentKey);
  }

  private recordFor(key: string | null): TrackRecord | null {
    return key === null ? null : this.queue.recordForKey(key);
  }

  private selectKey(key: string | null): TrackRecord | null {
    return this.select(this.recordFor(key));
  }

  private select(record: TrackRecord | null): TrackRecord | null {
    if (!record) {
      return null;
    }

    const changed = this.currentKey !== record.key;
    this.currentKey = record.key;
    this.persistSession();
    if (changed) {
      this.emit({ type: "current.changed", payload: { track: record } });
    }
    return record;
  }

  /** Drops the permutation if weights moved since it was built. */
  private ensureShuffleCurrent(): void {
    if (this.weights.getRevision() !== this.shuffleRevision) {
      this.invalidateShuffle();
    }
  }

  private invalidateShuffle(): void {
    this.shuffle.reset();
    this.shuffleRevision = this.weights.getRevision();
  }

  private applyWeightMutation(mutation: WeightMutation): boolean {
    if (mutation.changed) {
      this.invalidateShuffle();
    }
    return mutation.changed;
  }

  private applyScopeChange(change: ScopeChange): void {
    switch (change.type) {
      case "none":
        return;
      case "replaced":
        this.shuffle.reset();
        this.logger.debug(`Playback scope is now ${describeScope(change.scope)}`);
        this.emit({ type: "scope.changed", payload: { scope: change.scope } });
        return;
      case "members":
        this.shuffle.integrate(change.added, change.removed);
        return;
    }
  }

  private ensureMembersInQueue(paths: string[]): void {
    this.onQueueAppended(this.queue.addPaths(paths), this.scopeHydration);
  }

  private onQueueAppended(inserted: TrackRecord[], hydration: HydrationQueue): void {
    if (inserted.length === 0) {
      return;
    }

    if (this.scopes.currentScope().kind === "queue") {
      this.shuffle.integrate(inserted.map((record) => record.key), []);
    }

    void hydration.enqueueAll(inserted.map((record) => ({ trackId: record.id, filePath: record.path })));
    this.persistSession();
  }

  private async refreshActivePlaylist(playlistId: string): Promise<void> {
    if (!this.scopes.isPlaylistActive(playlistId)) {
      return;
    }

    const paths = await this.playlists.membersInOrder(playlistId);
    if (!this.scopes.isPlaylistActive(playlistId)) {
      return;
    }
    if (!paths || paths.length === 0) {
      this.setScopeQueue();
      return;
    }

    this.ensureMembersInQueue(paths);
    this.applyScopeChange(this.scopes.updateScopeMembersIfActive(playlistId, paths));
  }

  private persistSession(): void {
    this.session?.scheduleSave({
      queuePaths: this.queue.getItems().map((item) => item.path),
      currentTrackPath: this.currentTrack()?.path ?? null
    });
  }

  private emit(event: SchedulerEvent): void {
    this.events.emit("event", event);
  }
}
