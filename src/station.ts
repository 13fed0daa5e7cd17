import { mkdir } from "node:fs/promises";
import type { AppConfig } from "./config";
import { CoverArtManager } from "./cover-art";
import { InjectionQueue } from "./injection-queue";
import { NarrationWriter } from "./llm";
import { errorMessage, log, logError } from "./log";
import { readTrackMetadata } from "./metadata";
import { Narrator, type NarrationGenerator } from "./narrator";
import { LibraryPlaylist } from "./playlist";
import { HlsPublisher, type PublisherHooks, type StreamOutput } from "./publisher";
import { RuntimeState } from "./runtime-state";
import { InsertionScheduler } from "./scheduler";
import { TrackSensitiveFallback } from "./selector";
import { LookaheadTracker } from "./tracker";
import { SpeechClient } from "./tts";
import type { MetadataReader, PlayRequest, RequestMetadataReader, RequestSource, TrackMetadata } from "./types";

export type OutputFactory = (
  source: RequestSource,
  resolveMetadata: RequestMetadataReader,
  hooks: PublisherHooks
) => StreamOutput;

/** Collaborators that default to the real disk, model APIs and ffmpeg. */
export type StationDeps = {
  readMetadata?: MetadataReader;
  narrator?: NarrationGenerator;
  createOutput?: OutputFactory;
};

export class Station {
  private readonly runtime: RuntimeState;
  private readonly covers: CoverArtManager;
  private readonly tracker: LookaheadTracker;
  private readonly queue = new InjectionQueue();
  private readonly scheduler: InsertionScheduler;
  private readonly playlist: LibraryPlaylist;
  private readonly publisher: StreamOutput;
  private running = false;
  private starting: Promise<void> | null = null;

  constructor(
    private readonly config: AppConfig,
    deps: StationDeps = {}
  ) {
    this.runtime = new RuntimeState(config.defaultCoverPath);
    this.covers = new CoverArtManager(config.defaultCoverPath);
    const readMetadata = deps.readMetadata ?? readTrackMetadata;

    this.scheduler = new InsertionScheduler(deps.narrator ?? this.createNarrator(), this.queue, {
      maxConcurrent: config.maxConcurrentNarrations,
      hooks: {
        onTriggered: (task) => this.runtime.narrationTriggered(task),
        onQueued: (item) => this.runtime.narrationQueued(item),
        onFailed: (task, message) => this.runtime.narrationFailed(task, message)
      }
    });

    this.tracker = new LookaheadTracker(
      readMetadata,
      (history, next) => this.scheduler.onBatchReady(history, next),
      config.narrateEveryNTracks
    );

    this.playlist = new LibraryPlaylist(config.audioDir, {
      prefetch: config.prefetch,
      checkNext: async (request) => {
        const accepted = await this.tracker.checkNext(request);
        this.runtime.setUpcoming(this.tracker.nextTrack(), this.tracker.historyLength());
        return accepted;
      }
    });

    const createOutput: OutputFactory =
      deps.createOutput ?? ((source, resolveMetadata, hooks) => new HlsPublisher(config.hlsDir, source, resolveMetadata, hooks));
    this.publisher = createOutput(
      new TrackSensitiveFallback(this.queue, this.playlist),
      (request) => this.tracker.metadataFor(request),
      {
        onError: (message) => this.runtime.recordFailure("publisher", message),
        onStopped: (reason) => this.handleOutputStopped(reason),
        onTrackStarted: (request, metadata) => this.handleTrackStarted(request, metadata),
        onTrackFinished: (request) => this.runtime.trackFinished(request),
        onProgress: (fraction) => this.runtime.setPosition(fraction)
      }
    );
  }

  getRuntimeState(): RuntimeState {
    return this.runtime;
  }

  currentCover(): string {
    return this.covers.current();
  }

  hlsPlaylistDir(): string {
    return this.config.hlsDir;
  }

  start(): Promise<void> {
    if (this.running) return Promise.resolve();
    if (!this.starting) {
      this.starting = this.launch().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  private async launch(): Promise<void> {
    await mkdir(this.config.workDir, { recursive: true });
    await this.covers.init();
    const tracks = await this.playlist.load();
    if (tracks === 0) {
      throw new Error(`No audio files found in ${this.config.audioDir}`);
    }
    await this.publisher.start();
    if (!this.publisher.isRunning()) {
      throw new Error("Output stopped while the station was starting");
    }
    this.running = true;
    this.runtime.setRunning(true);
    log("station.started", { tracks, narrateEvery: this.config.narrateEveryNTracks });
  }

  async stop(): Promise<void> {
    if (this.starting) {
      try {
        await this.starting;
      } catch (error) {
        logError("station.stop.start_failed", error);
      }
    }
    const wasRunning = this.running;
    this.running = false;
    await this.publisher.stop();
    await this.covers.close();
    if (!wasRunning) return;
    this.runtime.setRunning(false);
    log("station.stopped", { pendingNarrations: this.scheduler.pendingCount(), inFlight: this.scheduler.inFlightCount() });
  }

  skipCurrent(): boolean {
    return this.publisher.skipCurrent();
  }

  status(): Record<string, unknown> {
    const s = this.runtime.snapshot();
    return {
      running: s.running,
      publishing: this.publisher.isRunning(),
      startedAt: s.startedAt,
      libraryTracks: this.playlist.size(),
      nowPlaying: s.nowPlaying,
      upcoming: s.upcoming,
      historyLength: this.tracker.historyLength(),
      injectionQueue: this.queue.length,
      narrationsInFlight: this.scheduler.inFlightCount(),
      stats: s.stats
    };
  }

  private handleOutputStopped(reason: string): void {
    if (!this.running) return;
    this.running = false;
    this.runtime.setRunning(false);
    log("station.output.lost", { reason });
  }

  private handleTrackStarted(request: PlayRequest, metadata: TrackMetadata): void {
    this.runtime.trackStarted(request, metadata);
    // Only the library feeds history, display and cover art.
    if (request.kind !== "library") return;

    this.tracker.onTrackMetadata(metadata);
    this.runtime.setDisplay(this.tracker.display());
    this.runtime.setUpcoming(this.tracker.nextTrack(), this.tracker.historyLength());
    this.covers
      .extract(metadata)
      .then((result) => this.runtime.coverChanged(result))
      .catch((error) => {
        logError("cover.extract.error", error, { filename: metadata.filename });
        this.runtime.recordFailure("cover", errorMessage(error));
      });
  }

  private createNarrator(): Narrator {
    const config = this.config;
    const writer = new NarrationWriter({
      apiKey: config.openai.apiKey,
      baseUrl: config.openai.baseUrl,
      model: config.openai.chatModel,
      timeoutMs: config.openai.requestTimeoutMs
    });
    const speech = new SpeechClient({
      apiKey: config.openai.apiKey,
      baseUrl: config.openai.baseUrl,
      model: config.openai.ttsModel,
      voice: config.openai.voice,
      speed: config.openai.speed,
      format: config.openai.format,
      timeoutMs: config.openai.requestTimeoutMs
    });

    return new Narrator(writer, speech, config.workDir);
  }
}
