import path from "node:path";
import { promises as fs } from "node:fs";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * One JSON document on disk. Reads never throw; writes are atomic and serialized so a
 * later write can't land before an earlier one.
 */
export class JsonFile {
  private readonly filePath: string;
  private writeQueue: Promise<void> = Promise.resolve();

  public constructor(filePath: string) {
    this.filePath = filePath;
  }

  public getPath(): string {
    return this.filePath;
  }

  public async read(): Promise<unknown> {
    try {
      const data = await fs.readFile(this.filePath, "utf8");
      return JSON.parse(data) as unknown;
    } catch {
      return null;
    }
  }

  public async write(payload: unknown): Promise<void> {
    const serialized = JSON.stringify(payload, null, 2);
    const next = this.writeQueue.then(async () => {
      const dir = path.dirname(this.filePath);
      const tempPath = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;

      await fs.mkdir(dir, { recursive: true });

      try {
        await fs.writeFile(tempPath, serialized, "utf8");
        await fs.rename(tempPath, this.filePath);
      } catch (error) {
        await fs.unlink(tempPath).catch(() => undefined);
        throw error;
      }
    });

    // keep the chain alive for the next writer even if this one failed
    this.writeQueue = next.catch(() => undefined);
    await next;
  }
}
