import type { InjectionQueue } from "./injection-queue";
import { log } from "./log";
import type { PlayRequest, RequestSource } from "./types";

/**
 * Picks what plays next. Only consulted by the output stage at a track
 * boundary, so a narration that becomes ready mid-track waits for the
 * current track to end.
 */
export class TrackSensitiveFallback implements RequestSource {
  constructor(
    private readonly priority: InjectionQueue,
    private readonly fallback: RequestSource
  ) {}

  async next(): Promise<PlayRequest> {
    const injected = this.priority.shift();
    if (injected) {
      log("selector.injected", { requestId: injected.id, seq: injected.seq, remaining: this.priority.length });
      return injected;
    }
    return this.fallback.next();
  }
}
