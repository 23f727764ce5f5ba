import os from "node:os";
import path from "node:path";
import {
  DATA_DIR_NAME,
  PLAYLISTS_FILE,
  SCOPE_FILE,
  SESSION_FILE,
  WEIGHTS_FILE
} from "../shared/constants.js";
import type { SchedulerSettings } from "../shared/types.js";
import { ConfigStore } from "./services/config-store.js";
import { MetadataService, type MetadataReader } from "./services/metadata-service.js";
import { PersistenceLogger } from "./services/persistence-logger.js";
import { PlaybackScheduler } from "./services/playback-scheduler.js";
import { PlaylistsStore } from "./services/playlists-store.js";
import { QueueManager } from "./services/queue-manager.js";
import { ScopeResolver } from "./services/scope-resolver.js";
import { ScopeStore } from "./services/scope-store.js";
import { SessionStore } from "./services/session-store.js";
import { UnplayableTracker } from "./services/unplayable-tracker.js";
import type { RandomSource } from "./services/weighted-shuffle.js";
import { WeightStore } from "./services/weight-store.js";

export interface CreateSchedulerOptions {
  /** Directory holding config and state files. Defaults to `~/.scoped-shuffle`. */
  dataDir?: string;
  /** Overrides values read from `config.json`. */
  settings?: Partial<SchedulerSettings>;
  random?: RandomSource;
  readMetadata?: MetadataReader;
  logger?: PersistenceLogger;
}

export function defaultDataDir(): string {
  return path.join(os.homedir(), DATA_DIR_NAME);
}

/** Builds a scheduler over the files in `dataDir` and restores the previous session. */
export async function createPlaybackScheduler(options: CreateSchedulerOptions = {}): Promise<PlaybackScheduler> {
  const dataDir = options.dataDir ?? defaultDataDir();
  const logger = options.logger ?? new PersistenceLogger();
  const settings: SchedulerSettings = {
    ...(await new ConfigStore(dataDir).load()),
    ...options.settings
  };

  const queue = new QueueManager();
  const unplayable = new UnplayableTracker();
  const scopeStore = new ScopeStore(path.join(dataDir, SCOPE_FILE), logger);
  const metadata = new MetadataService();

  const scheduler = new PlaybackScheduler({
    queue,
    unplayable,
    weights: new WeightStore({
      filePath: path.join(dataDir, WEIGHTS_FILE),
      flushDelayMs: settings.weightFlushDelayMs,
      logger
    }),
    scopes: new ScopeResolver({ queue, unplayable, store: scopeStore }),
    playlists: new PlaylistsStore(path.join(dataDir, PLAYLISTS_FILE), logger),
    session: new SessionStore(path.join(dataDir, SESSION_FILE), settings.sessionFlushDelayMs, logger),
    scopeStore,
    logger,
    readMetadata: options.readMetadata ?? ((filePath) => metadata.read(filePath)),
    hydrationConcurrency: settings.hydrationConcurrency,
    restoreScopeOnStartup: settings.restoreScopeOnStartup,
    random: options.random
  });

  await scheduler.init();
  return scheduler;
}

export type {
  PersistenceNotice,
  PlaybackFeedback,
  PlaybackMode,
  PlaybackScope,
  SchedulerEvent,
  SchedulerSettings,
  TrackMetadata,
  TrackRecord,
  UserPlaylist,
  WeightLevel,
  WeightSyncResult
} from "../shared/types.js";
export { WEIGHT_MULTIPLIERS } from "../shared/constants.js";
export { canonicalKey, legacyKeys, lookupKeys } from "./services/path-key.js";
export { ConfigStore } from "./services/config-store.js";
export { PersistenceLogger } from "./services/persistence-logger.js";
export { PlaybackScheduler, type PlaybackSchedulerDeps } from "./services/playback-scheduler.js";
export { WeightedShuffle, type RandomSource, type ShuffleSource } from "./services/weighted-shuffle.js";
export { WeightStore } from "./services/weight-store.js";
