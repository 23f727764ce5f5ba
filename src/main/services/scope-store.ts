import type { PersistedScopeSelection, PlaybackScope } from "../../shared/types.js";
import { isRecord, JsonFile } from "./json-file.js";
import { PersistenceLogger } from "./persistence-logger.js";

export function toPersistedSelection(scope: PlaybackScope): PersistedScopeSelection {
  return scope.kind === "queue"
    ? { kind: "queue" }
    : { kind: "playlist", playlistID: scope.playlistId };
}

export function sanitizeScopeSelection(raw: unknown): PersistedScopeSelection | null {
  if (!isRecord(raw)) {
    return null;
  }

  if (raw.kind === "queue") {
    return { kind: "queue" };
  }

  if (raw.kind === "playlist" && typeof raw.playlistID === "string" && raw.playlistID.trim().length > 0) {
    return { kind: "playlist", playlistID: raw.playlistID.trim() };
  }

  return null;
}

export class ScopeStore {
  private readonly file: JsonFile;
  private readonly logger: PersistenceLogger;

  public constructor(filePath: string, logger: PersistenceLogger = new PersistenceLogger()) {
    this.file = new JsonFile(filePath);
    this.logger = logger;
  }

  public async load(): Promise<PersistedScopeSelection | null> {
    return sanitizeScopeSelection(await this.file.read());
  }

  public async save(scope: PlaybackScope): Promise<void> {
    try {
      await this.file.write(toPersistedSelection(scope));
    } catch (error) {
      this.logger.reportWriteFailure("playback scope", error);
    }
  }
}
