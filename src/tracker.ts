import path from "node:path";
import { errorMessage, logError, logWarn } from "./log";
import type { BatchHandler, MetadataReader, PlayRequest, TrackMetadata } from "./types";

export const DEFAULT_BATCH_SIZE = 4;
// Requests announced but never played (a stop, a reload) age out past this.
const RESOLVED_LIMIT = 16;

export class LookaheadTracker {
  private history: TrackMetadata[] = [];
  private upcoming: TrackMetadata | null = null;
  private readonly resolved = new Map<string, TrackMetadata>();
  private title = "";
  private artist = "";

  constructor(
    private readonly readMetadata: MetadataReader,
    private readonly onBatchReady: BatchHandler,
    private readonly batchSize = DEFAULT_BATCH_SIZE
  ) {}

  /** Playlist hook, run before a request becomes the upcoming item. */
  async checkNext(request: PlayRequest): Promise<boolean> {
    try {
      const meta = await this.readMetadata(request.filePath);
      this.upcoming = meta;
      this.remember(request.id, meta);
    } catch (error) {
      logWarn("lookahead.metadata.unreadable", {
        filePath: request.filePath,
        error: errorMessage(error)
      });
      this.upcoming = { filename: path.basename(request.filePath) };
    }
    return true;
  }

  /** Metadata for a request about to play, reusing what lookahead already read. */
  async metadataFor(request: PlayRequest): Promise<TrackMetadata> {
    const cached = this.resolved.get(request.id);
    if (cached) {
      this.resolved.delete(request.id);
      return cached;
    }
    return this.readMetadata(request.filePath);
  }

  onTrackMetadata(meta: TrackMetadata): void {
    this.title = meta.title ?? "";
    this.artist = meta.artist ?? "";

    this.history.push(meta);
    if (this.history.length < this.batchSize) {
      return;
    }

    const batch = this.history;
    this.history = [];
    try {
      this.onBatchReady(batch, this.upcoming);
    } catch (error) {
      logError("history.batch.handler_failed", error, { size: batch.length });
    }
  }

  nextTrack(): TrackMetadata | null {
    return this.upcoming;
  }

  historyLength(): number {
    return this.history.length;
  }

  display(): { title: string; artist: string } {
    return { title: this.title, artist: this.artist };
  }

  private remember(id: string, meta: TrackMetadata): void {
    this.resolved.set(id, meta);
    for (const key of this.resolved.keys()) {
      if (this.resolved.size <= RESOLVED_LIMIT) break;
      this.resolved.delete(key);
    }
  }
}
