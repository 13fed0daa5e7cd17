import type {
  CoverResult,
  InjectedRequest,
  NarrationTask,
  NowPlaying,
  PlayRequest,
  StationEvent,
  StationSnapshot,
  SystemErrorItem,
  TrackMetadata
} from "./types";

const MAX_RECENT_EVENTS = 200;
const MAX_RECENT_ERRORS = 50;
const POSITION_EPSILON = 0.01;

type Listener = (event: StationEvent) => void;

function trimNewest<T>(items: T[], max: number): T[] {
  return items.slice(0, max);
}

function cloneSnapshot(snapshot: StationSnapshot): StationSnapshot {
  return structuredClone(snapshot);
}

export class RuntimeState {
  private listeners = new Set<Listener>();

  private snapshotState: StationSnapshot;

  constructor(defaultCoverPath: string) {
    this.snapshotState = {
      running: false,
      startedAt: null,
      nowPlaying: null,
      display: {
        title: "",
        artist: "",
        coverPath: defaultCoverPath,
        position: 0
      },
      upcoming: null,
      historyLength: 0,
      injectionQueue: [],
      stats: {
        tracksPlayed: 0,
        narrationsPlayed: 0,
        narrationsTriggered: 0,
        narrationsQueued: 0,
        generationFailures: 0,
        coverFallbacks: 0
      },
      recentEvents: [],
      recentErrors: []
    };
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  snapshot(): StationSnapshot {
    return cloneSnapshot(this.snapshotState);
  }

  setRunning(running: boolean): void {
    if (this.snapshotState.running === running) return;
    this.snapshotState.running = running;
    this.snapshotState.startedAt = running ? new Date().toISOString() : null;
    if (!running) {
      this.snapshotState.nowPlaying = null;
      this.snapshotState.display.position = 0;
    }
    this.emit(running ? "station.started" : "station.stopped", {});
  }

  trackStarted(request: PlayRequest, meta: TrackMetadata): void {
    const nowPlaying: NowPlaying = {
      requestId: request.id,
      kind: request.kind,
      title: meta.title ?? request.title ?? meta.filename,
      artist: meta.artist ?? "",
      durationSec: meta.durationSec ?? null,
      startedAt: new Date().toISOString()
    };
    this.snapshotState.nowPlaying = nowPlaying;
    this.snapshotState.display.position = 0;
    if (request.kind === "narration") {
      this.snapshotState.injectionQueue = this.snapshotState.injectionQueue.filter((q) => q.id !== request.id);
    }
    this.emit("track.started", { nowPlaying });
  }

  setDisplay(display: { title: string; artist: string }): void {
    this.snapshotState.display.title = display.title;
    this.snapshotState.display.artist = display.artist;
    this.emit("display.updated", { ...display });
  }

  trackFinished(request: PlayRequest): void {
    if (request.kind === "library") this.snapshotState.stats.tracksPlayed += 1;
    else this.snapshotState.stats.narrationsPlayed += 1;
    if (this.snapshotState.nowPlaying?.requestId === request.id) {
      this.snapshotState.nowPlaying = null;
    }
    this.emit("track.finished", { requestId: request.id, kind: request.kind });
  }

  setPosition(fraction: number): void {
    const clamped = Math.max(0, Math.min(1, fraction));
    if (Math.abs(clamped - this.snapshotState.display.position) < POSITION_EPSILON) {
      return;
    }
    this.snapshotState.display.position = clamped;
    this.notify("transport.progress", { position: clamped });
  }

  setUpcoming(meta: TrackMetadata | null, historyLength: number): void {
    this.snapshotState.upcoming = meta ? { title: meta.title ?? meta.filename, artist: meta.artist ?? "" } : null;
    this.snapshotState.historyLength = historyLength;
    this.emit("lookahead.updated", { upcoming: this.snapshotState.upcoming, historyLength });
  }

  coverChanged(result: CoverResult): void {
    this.snapshotState.display.coverPath = result.path;
    if (result.kind === "default") {
      this.snapshotState.stats.coverFallbacks += 1;
      this.emit("cover.default", { reason: result.reason, path: result.path });
      return;
    }
    this.emit("cover.changed", { path: result.path, generation: result.generation });
  }

  narrationTriggered(task: NarrationTask): void {
    this.snapshotState.stats.narrationsTriggered += 1;
    this.snapshotState.historyLength = 0;
    this.emit("narration.triggered", { seq: task.seq });
  }

  narrationQueued(item: InjectedRequest): void {
    this.snapshotState.stats.narrationsQueued += 1;
    this.snapshotState.injectionQueue = [
      ...this.snapshotState.injectionQueue,
      { seq: item.seq, id: item.id, filePath: item.filePath }
    ];
    this.emit("narration.queued", { seq: item.seq, requestId: item.id, queueLength: this.snapshotState.injectionQueue.length });
  }

  narrationFailed(task: NarrationTask, message: string): void {
    this.snapshotState.stats.generationFailures += 1;
    this.recordError("narration", message);
    this.emit("narration.failed", { seq: task.seq, error: message });
  }

  recordFailure(source: string, message: string): void {
    this.recordError(source, message);
    this.emit(`${source}.error`, { error: message });
  }

  private recordError(source: string, message: string): void {
    const error: SystemErrorItem = {
      ts: new Date().toISOString(),
      source,
      message
    };
    this.snapshotState.recentErrors = trimNewest([error, ...this.snapshotState.recentErrors], MAX_RECENT_ERRORS);
  }

  private emit(event: string, payload: Record<string, unknown>): void {
    const compact: StationEvent = {
      ts: new Date().toISOString(),
      event,
      payload
    };
    this.snapshotState.recentEvents = trimNewest([compact, ...this.snapshotState.recentEvents], MAX_RECENT_EVENTS);
    this.broadcast(compact);
  }

  // Progress ticks go to listeners but stay out of the event history.
  private notify(event: string, payload: Record<string, unknown>): void {
    this.broadcast({ ts: new Date().toISOString(), event, payload });
  }

  private broadcast(compact: StationEvent): void {
    const out: StationEvent = {
      ...compact,
      snapshot: this.snapshot()
    };
    for (const listener of this.listeners) {
      listener(out);
    }
  }
}
