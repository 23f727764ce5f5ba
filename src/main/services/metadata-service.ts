import { parseFile } from "music-metadata";
import { UNKNOWN_ALBUM, UNKNOWN_ARTIST } from "../../shared/constants.js";
import type { TrackMetadata } from "../../shared/types.js";
import { placeholderMetadata } from "./queue-manager.js";

function nonEmpty(value: string | undefined, fallback: string): string {
  if (typeof value !== "string") {
    return fallback;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

export type MetadataReader = (filePath: string) => Promise<TrackMetadata>;

/** Tag reader for hydration. Any parse failure yields filename-based placeholder metadata. */
export class MetadataService {
  private readonly inFlight = new Map<string, Promise<TrackMetadata>>();

  public async read(filePath: string): Promise<TrackMetadata> {
    const pending = this.inFlight.get(filePath);
    if (pending) {
      return await pending;
    }

    const task = this.parse(filePath).finally(() => {
      this.inFlight.delete(filePath);
    });
    this.inFlight.set(filePath, task);
    return await task;
  }

  private async parse(filePath: string): Promise<TrackMetadata> {
    const fallback = placeholderMetadata(filePath);
    try {
      const parsed = await parseFile(filePath, {
        skipCovers: true,
        duration: false
      });
      const duration = parsed.format.duration;
      return {
        title: nonEmpty(parsed.common.title, fallback.title),
        artist: nonEmpty(parsed.common.artist, UNKNOWN_ARTIST),
        album: nonEmpty(parsed.common.album, UNKNOWN_ALBUM),
        durationSec: typeof duration === "number" && Number.isFinite(duration) ? duration : null
      };
    } catch {
      return fallback;
    }
  }
}
