import { EventEmitter } from "node:events";
import type { PersistenceNotice } from "../../shared/types.js";

const PREFIX = "[Persistence]";

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export class PersistenceLogger {
  private readonly events = new EventEmitter();
  private readonly debugEnabled: boolean;

  public constructor(debugEnabled = Boolean(process.env.SCOPED_SHUFFLE_DEBUG)) {
    this.debugEnabled = debugEnabled;
  }

  public debug(message: string): void {
    if (this.debugEnabled) {
      console.debug(`${PREFIX} ${message}`);
    }
  }

  public warn(message: string): void {
    console.warn(`${PREFIX} ${message}`);
  }

  public error(message: string, error?: unknown): void {
    if (error === undefined) {
      console.error(`${PREFIX} ${message}`);
      return;
    }
    console.error(`${PREFIX} ${message}: ${describeError(error)}`);
  }

  /** Logs a failed write and raises an advisory notice; never throws. */
  public reportWriteFailure(what: string, error: unknown): void {
    this.error(`Failed to save ${what}`, error);
    this.notifyUser({
      title: `Could not save ${what}`,
      detail: "Check disk permissions and free space."
    });
  }

  public notifyUser(notice: PersistenceNotice): void {
    this.events.emit("notice", notice);
  }

  public subscribe(listener: (notice: PersistenceNotice) => void): () => void {
    this.events.on("notice", listener);
    return () => {
      this.events.off("notice", listener);
    };
  }
}
