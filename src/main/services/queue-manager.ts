import { randomUUID } from "node:crypto";
import path from "node:path";
import { UNKNOWN_ALBUM, UNKNOWN_ARTIST } from "../../shared/constants.js";
import type { TrackMetadata, TrackRecord } from "../../shared/types.js";
import { canonicalKey, lookupKeys } from "./path-key.js";
import { isAudioFile, listAudioFilesRecursive } from "./path-utils.js";

export function placeholderMetadata(filePath: string): TrackMetadata {
  const title = path.basename(filePath, path.extname(filePath));
  return {
    title: title.length > 0 ? title : path.basename(filePath),
    artist: UNKNOWN_ARTIST,
    album: UNKNOWN_ALBUM,
    durationSec: null
  };
}

export interface QueueRemoval {
  removed: TrackRecord | null;
  index: number;
}

/**
 * The physical track collection. Records are unique by lookup key; order is insertion
 * order and is what queue-scope sequential playback walks.
 */
export class QueueManager {
  private items: TrackRecord[] = [];
  private indexByLookupKey = new Map<string, number>();

  public getItems(): readonly TrackRecord[] {
    return this.items;
  }

  public size(): number {
    return this.items.length;
  }

  public at(index: number): TrackRecord | null {
    if (!Number.isInteger(index) || index < 0) {
      return null;
    }
    return this.items[index] ?? null;
  }

  public keys(): string[] {
    return this.items.map((item) => item.key);
  }

  /** Index of the record matching any lookup key of `keyOrPath`. */
  public indexOfKey(keyOrPath: string): number | null {
    for (const key of lookupKeys(keyOrPath)) {
      const index = this.indexByLookupKey.get(key);
      if (index !== undefined) {
        return index;
      }
    }
    return null;
  }

  public recordForKey(keyOrPath: string): TrackRecord | null {
    const index = this.indexOfKey(keyOrPath);
    return index === null ? null : this.at(index);
  }

  /** Appends audio files not already present. Returns the inserted records in order. */
  public addPaths(paths: string[]): TrackRecord[] {
    const inserted: TrackRecord[] = [];

    for (const filePath of paths) {
      const key = canonicalKey(filePath);
      if (key.length === 0 || !isAudioFile(key) || this.indexOfKey(key) !== null) {
        continue;
      }

      const record: TrackRecord = {
        id: randomUUID(),
        path: key,
        key,
        metadata: placeholderMetadata(key)
      };
      this.items.push(record);
      this.registerKeys(record, this.items.length - 1);
      inserted.push(record);
    }

    return inserted;
  }

  public async addFolder(rootPath: string): Promise<TrackRecord[]> {
    return this.addPaths(await listAudioFilesRecursive(rootPath));
  }

  public removeTrack(keyOrPath: string): QueueRemoval {
    const index = this.indexOfKey(keyOrPath);
    if (index === null) {
      return { removed: null, index: -1 };
    }

    const [removed] = this.items.splice(index, 1);
    this.rebuildIndex();
    return { removed: removed ?? null, index };
  }

  public clear(): TrackRecord[] {
    const previous = this.items;
    this.items = [];
    this.indexByLookupKey.clear();
    return previous;
  }

  public updateMetadata(trackId: string, metadata: TrackMetadata): boolean {
    const target = this.items.find((item) => item.id === trackId);
    if (!target) {
      return false;
    }

    target.metadata = metadata;
    return true;
  }

  private registerKeys(record: TrackRecord, index: number): void {
    for (const key of lookupKeys(record.key)) {
      if (!this.indexByLookupKey.has(key)) {
        this.indexByLookupKey.set(key, index);
      }
    }
  }

  private rebuildIndex(): void {
    this.indexByLookupKey.clear();
    this.items.forEach((item, index) => {
      this.registerKeys(item, index);
    });
  }
}
