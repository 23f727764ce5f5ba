export type PlaybackScope =
  | { kind: "queue" }
  | { kind: "playlist"; playlistId: string };

export type PlaybackMode = "sequential" | "random";

export type WeightLevel = 0 | 1 | 2 | 3 | 4;

export interface TrackMetadata {
  title: string;
  artist: string;
  album: string;
  durationSec: number | null;
}

export interface TrackRecord {
  id: string;
  path: string;
  key: string;
  metadata: TrackMetadata;
}

export interface UserPlaylistTrack {
  path: string;
}

export interface UserPlaylist {
  id: string;
  name: string;
  tracks: UserPlaylistTrack[];
  createdAt: number;
  updatedAt: number;
}

export interface SchedulerSettings {
  weightFlushDelayMs: number;
  sessionFlushDelayMs: number;
  hydrationConcurrency: number;
  restoreScopeOnStartup: boolean;
}

export interface PersistedWeights {
  version: number;
  queueLevels: Record<string, number>;
  playlistLevels: Record<string, Record<string, number>>;
}

export type PersistedScopeSelection =
  | { kind: "queue" }
  | { kind: "playlist"; playlistID: string };

export interface SessionState {
  version: number;
  queuePaths: string[];
  currentTrackPath: string | null;
}

export interface WeightSyncResult {
  total: number;
  changed: number;
}

export interface PersistenceNotice {
  title: string;
  detail: string;
}

export type SchedulerEvent =
  | { type: "weights.changed"; payload: { revision: number } }
  | { type: "scope.changed"; payload: { scope: PlaybackScope } }
  | { type: "unplayable.changed"; payload: { key: string; reason: string | null } }
  | { type: "current.changed"; payload: { track: TrackRecord | null } }
  | { type: "persistence.error"; payload: PersistenceNotice };

export type PlaybackFeedback =
  | { type: "failed"; path: string; reason?: string }
  | { type: "loaded"; path: string };
