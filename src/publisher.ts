import { mkdir } from "node:fs/promises";
import path from "node:path";
import { spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import { errorMessage, log, logError } from "./log";
import type { PlayRequest, RequestMetadataReader, RequestSource, TrackMetadata } from "./types";

export type PublisherHooks = {
  onError?: (message: string, exitCode?: number | null) => void;
  onStopped?: (reason: string) => void;
  onTrackStarted?: (request: PlayRequest, metadata: TrackMetadata) => void;
  onTrackFinished?: (request: PlayRequest) => void;
  onProgress?: (fraction: number) => void;
};

export interface StreamOutput {
  start(): Promise<void>;
  stop(): Promise<void>;
  skipCurrent(): boolean;
  isRunning(): boolean;
}

export type FfmpegRole = "ingest" | "transcode";

/** The slice of a child process the publisher drives. */
export interface FfmpegProcess {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: "error", listener: (error: Error) => void): this;
  on(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export type FfmpegSpawner = (args: string[], role: FfmpegRole) => FfmpegProcess;

const spawnFfmpeg: FfmpegSpawner = (args, role) =>
  spawn("ffmpeg", args, { stdio: role === "ingest" ? ["pipe", "ignore", "pipe"] : ["ignore", "pipe", "pipe"] });

const PROGRESS_INTERVAL_MS = 500;

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function ingestArgs(playlistPath: string): string[] {
  return [
    "-loglevel",
    "error",
    "-re",
    "-f",
    "s16le",
    "-ar",
    "48000",
    "-ac",
    "2",
    "-i",
    "pipe:0",
    "-c:a",
    "aac",
    "-b:a",
    "192k",
    "-f",
    "hls",
    "-hls_time",
    "4",
    "-hls_list_size",
    "6",
    "-hls_flags",
    "delete_segments",
    playlistPath
  ];
}

function transcodeArgs(filePath: string): string[] {
  return ["-loglevel", "error", "-i", filePath, "-vn", "-f", "s16le", "-ar", "48000", "-ac", "2", "pipe:1"];
}

/**
 * Encodes one continuous HLS stream. Items are pulled from the source only
 * between tracks; whatever is playing always runs to its end unless skipped.
 */
export class HlsPublisher implements StreamOutput {
  private readonly playlistPath: string;
  private ingest?: FfmpegProcess;
  private currentTranscode?: FfmpegProcess;
  private running = false;
  private starting: Promise<void> | null = null;
  private loop: Promise<void> = Promise.resolve();
  private lostReason: string | null = null;

  constructor(
    private readonly hlsDir: string,
    private readonly source: RequestSource,
    private readonly resolveMetadata: RequestMetadataReader,
    private readonly hooks: PublisherHooks = {},
    private readonly spawnProcess: FfmpegSpawner = spawnFfmpeg
  ) {
    this.playlistPath = path.join(hlsDir, "stream.m3u8");
  }

  isRunning(): boolean {
    return this.running;
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

  async stop(): Promise<void> {
    if (this.starting) {
      try {
        await this.starting;
      } catch (error) {
        logError("publisher.stop.start_failed", error);
      }
    }

    const ingest = this.ingest;
    this.ingest = undefined;
    this.running = false;
    this.currentTranscode?.kill("SIGTERM");
    ingest?.stdin?.end();
    ingest?.kill("SIGTERM");
    await this.loop;
    log("publisher.stopped");
  }

  skipCurrent(): boolean {
    if (!this.currentTranscode) {
      return false;
    }
    this.currentTranscode.kill("SIGTERM");
    return true;
  }

  private async launch(): Promise<void> {
    // A loop left over from a lost ingest must finish before a new one starts.
    await this.loop;
    await mkdir(this.hlsDir, { recursive: true });

    const ingest = this.spawnProcess(ingestArgs(this.playlistPath), "ingest");
    this.ingest = ingest;
    this.lostReason = null;

    ingest.stderr?.on("data", (d) => {
      const line = String(d).trim();
      if (line) {
        log("publisher.ffmpeg", { line });
      }
    });
    ingest.stdin?.on("error", (error) => {
      logError("publisher.ingest.input_error", error);
      this.hooks.onError?.(errorMessage(error));
    });
    ingest.on("error", (error) => this.ingestLost(ingest, `ffmpeg ingest failed: ${error.message}`, null));
    ingest.on("close", (code) => this.ingestLost(ingest, `ffmpeg ingest exited with ${code ?? -1}`, code));

    this.running = true;
    this.loop = this.processLoop().catch((err) => logError("publisher.loop.error", err));
    log("publisher.started", { playlistPath: this.playlistPath });
  }

  private ingestLost(ingest: FfmpegProcess, reason: string, code: number | null): void {
    // Ignore a process that stop() already let go of, and repeat notifications.
    if (this.ingest !== ingest) return;
    this.ingest = undefined;
    this.running = false;
    this.lostReason = reason;
    this.currentTranscode?.kill("SIGTERM");

    logError("publisher.exit", new Error(reason));
    this.hooks.onError?.(reason, code);
    this.hooks.onStopped?.(reason);
  }

  private async processLoop(): Promise<void> {
    while (this.running) {
      let request: PlayRequest;
      try {
        request = await this.source.next();
      } catch (error) {
        logError("publisher.source.error", error);
        this.hooks.onError?.(errorMessage(error));
        await wait(1000);
        continue;
      }
      if (!this.running) break;

      const metadata = await this.metadataFor(request);
      if (!this.running) break;

      const stopProgress = this.trackProgress(metadata.durationSec);
      try {
        this.hooks.onTrackStarted?.(request, metadata);
        await this.streamFile(request.filePath);
      } catch (error) {
        logError("publisher.stream.error", error, { filePath: request.filePath });
        if (this.running) {
          this.hooks.onError?.(errorMessage(error));
        }
      } finally {
        stopProgress();
        this.hooks.onTrackFinished?.(request);
      }
    }
  }

  private async metadataFor(request: PlayRequest): Promise<TrackMetadata> {
    let metadata: TrackMetadata;
    try {
      metadata = await this.resolveMetadata(request);
    } catch (error) {
      logError("publisher.metadata.error", error, { filePath: request.filePath });
      metadata = { filename: path.basename(request.filePath) };
    }
    if (request.kind === "narration" && request.title) {
      return { ...metadata, title: request.title, cover: undefined };
    }
    return metadata;
  }

  private trackProgress(durationSec: number | undefined): () => void {
    const startedAt = Date.now();
    this.hooks.onProgress?.(0);
    if (!durationSec) {
      return () => undefined;
    }
    const timer = setInterval(() => {
      const elapsedSec = (Date.now() - startedAt) / 1000;
      this.hooks.onProgress?.(Math.min(1, elapsedSec / durationSec));
    }, PROGRESS_INTERVAL_MS);
    return () => clearInterval(timer);
  }

  private async streamFile(filePath: string): Promise<void> {
    const ingestInput = this.ingest?.stdin;
    if (!ingestInput) {
      throw new Error("ffmpeg ingest is not running");
    }

    await new Promise<void>((resolve, reject) => {
      const transcode = this.spawnProcess(transcodeArgs(filePath), "transcode");
      const output = transcode.stdout;
      if (!output) {
        transcode.kill("SIGTERM");
        reject(new Error("transcode has no output"));
        return;
      }
      this.currentTranscode = transcode;

      transcode.stderr?.on("data", (d) => {
        const line = String(d).trim();
        if (line) {
          log("publisher.transcode", { line, filePath });
        }
      });

      output.pipe(ingestInput, { end: false });
      transcode.on("error", reject);
      transcode.on("close", (code, signal) => {
        if (this.currentTranscode === transcode) {
          this.currentTranscode = undefined;
        }
        output.unpipe(ingestInput);
        if (this.lostReason) {
          reject(new Error(`stream interrupted: ${this.lostReason}`));
          return;
        }
        if (code === 0 || signal === "SIGTERM") {
          resolve();
          return;
        }
        reject(new Error(`transcode failed with ${code}`));
      });
    });
  }
}
