import type { TrackMetadata } from "../../shared/types.js";

export interface HydrationRequest {
  trackId: string;
  filePath: string;
}

interface HydrationTask extends HydrationRequest {
  generation: number;
  resolve(): void;
}

export interface HydrationQueueOptions {
  concurrency: number;
  load(filePath: string): Promise<TrackMetadata>;
  apply(request: HydrationRequest, metadata: TrackMetadata): void;
  onError(request: HydrationRequest, error: unknown): void;
}

/**
 * Background metadata loads for tracks that entered the queue with placeholder metadata.
 * `cancel()` drops everything queued, and results of loads already running are discarded
 * instead of applied.
 */
export class HydrationQueue {
  private readonly pending: HydrationTask[] = [];
  private readonly inFlightByTrack = new Map<string, { generation: number; promise: Promise<void> }>();
  private readonly concurrency: number;
  private readonly load: (filePath: string) => Promise<TrackMetadata>;
  private readonly apply: (request: HydrationRequest, metadata: TrackMetadata) => void;
  private readonly onError: (request: HydrationRequest, error: unknown) => void;
  private workerCount = 0;
  private generation = 0;
  private shuttingDown = false;

  public constructor(options: HydrationQueueOptions) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency));
    this.load = options.load;
    this.apply = options.apply;
    this.onError = options.onError;
  }

  public enqueue(request: HydrationRequest): Promise<void> {
    if (this.shuttingDown) {
      return Promise.resolve();
    }

    const generation = this.generation;
    const existing = this.inFlightByTrack.get(request.trackId);
    if (existing && existing.generation === generation) {
      return existing.promise;
    }

    const taskPromise: Promise<void> = new Promise<void>((resolve) => {
      this.pending.push({
        ...request,
        generation,
        resolve
      });
      this.drain();
    }).finally(() => {
      if (this.inFlightByTrack.get(request.trackId)?.promise === taskPromise) {
        this.inFlightByTrack.delete(request.trackId);
      }
    });

    this.inFlightByTrack.set(request.trackId, { generation, promise: taskPromise });
    return taskPromise;
  }

  public enqueueAll(requests: HydrationRequest[]): Promise<void> {
    return Promise.all(requests.map((request) => this.enqueue(request))).then(() => undefined);
  }

  /** Abandons queued and running work; nothing from before this call gets applied. */
  public cancel(): void {
    this.generation += 1;
    const dropped = this.pending.splice(0, this.pending.length);
    for (const task of dropped) {
      task.resolve();
    }
  }

  public shutdown(): void {
    this.shuttingDown = true;
    this.cancel();
  }

  public pendingCount(): number {
    return this.pending.length + this.workerCount;
  }

  private drain(): void {
    if (this.shuttingDown) {
      return;
    }

    while (this.workerCount < this.concurrency) {
      const task = this.pending.shift();
      if (!task) {
        return;
      }

      this.workerCount += 1;
      void this.run(task).finally(() => {
        this.workerCount -= 1;
        task.resolve();
        this.drain();
      });
    }
  }

  private async run(task: HydrationTask): Promise<void> {
    try {
      const metadata = await this.load(task.filePath);
      if (task.generation === this.generation) {
        this.apply({ trackId: task.trackId, filePath: task.filePath }, metadata);
      }
    } catch (error) {
      this.onError({ trackId: task.trackId, filePath: task.filePath }, error);
    }
  }
}
