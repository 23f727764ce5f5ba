import { SESSION_FORMAT_VERSION } from "../../shared/constants.js";
import type { SessionState } from "../../shared/types.js";
import { isRecord, JsonFile } from "./json-file.js";
import { PersistenceLogger } from "./persistence-logger.js";

export function sanitizeSessionState(raw: unknown): SessionState | null {
  if (!isRecord(raw) || raw.version !== SESSION_FORMAT_VERSION) {
    return null;
  }

  const queuePaths = Array.isArray(raw.queuePaths)
    ? raw.queuePaths.filter((entry): entry is string => typeof entry === "string" && entry.length > 0)
    : [];
  const currentTrackPath = typeof raw.currentTrackPath === "string" && raw.currentTrackPath.length > 0
    ? raw.currentTrackPath
    : null;

  return {
    version: SESSION_FORMAT_VERSION,
    queuePaths,
    currentTrackPath
  };
}

/** Queue contents and the current-track pointer, saved on a debounce. */
export class SessionStore {
  private readonly file: JsonFile;
  private readonly flushDelayMs: number;
  private readonly logger: PersistenceLogger;
  private saveTimer: NodeJS.Timeout | null = null;
  private pending: SessionState | null = null;

  public constructor(filePath: string, flushDelayMs = 1000, logger: PersistenceLogger = new PersistenceLogger()) {
    this.file = new JsonFile(filePath);
    this.flushDelayMs = Math.max(0, flushDelayMs);
    this.logger = logger;
  }

  public async load(): Promise<SessionState | null> {
    return sanitizeSessionState(await this.file.read());
  }

  public scheduleSave(state: Omit<SessionState, "version">): void {
    this.pending = { version: SESSION_FORMAT_VERSION, ...state };

    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
    }
    this.saveTimer = setTimeout(() => {
      this.saveTimer = null;
      void this.flush();
    }, this.flushDelayMs);
  }

  public async flush(): Promise<void> {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
      this.saveTimer = null;
    }

    const state = this.pending;
    if (!state) {
      return;
    }
    this.pending = null;

    try {
      await this.file.write(state);
    } catch (error) {
      this.logger.reportWriteFailure("session", error);
    }
  }
}
