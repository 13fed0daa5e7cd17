import { access, readdir } from "node:fs/promises";
import path from "node:path";
import { log, logWarn } from "./log";
import type { PlayRequest, RequestSource } from "./types";

export const AUDIO_EXTENSIONS = new Set([".mp3", ".flac", ".ogg", ".opus", ".m4a", ".aac", ".wav"]);

export type PlaylistOptions = {
  prefetch?: number;
  /** Runs on each request before it becomes the upcoming item; `false` drops it. */
  checkNext?: (request: PlayRequest) => Promise<boolean>;
  random?: () => number;
};

type Prepared = {
  request: PlayRequest;
  announced: boolean;
};

export class LibraryPlaylist implements RequestSource {
  private files: string[] = [];
  private order: number[] = [];
  private ptr = 0;
  private lastFile: string | null = null;
  private buffer: Prepared[] = [];
  private requestCounter = 0;
  private readonly prefetch: number;
  private readonly random: () => number;

  constructor(
    private readonly libraryDir: string,
    private readonly opts: PlaylistOptions = {}
  ) {
    this.prefetch = Math.max(1, opts.prefetch ?? 1);
    this.random = opts.random ?? Math.random;
  }

  async load(): Promise<number> {
    const entries = await readdir(this.libraryDir, { recursive: true });
    this.files = entries
      .filter((entry) => AUDIO_EXTENSIONS.has(path.extname(entry).toLowerCase()))
      .map((entry) => path.join(this.libraryDir, entry))
      .sort();
    this.buffer = [];
    this.resetOrder();
    log("playlist.loaded", { dir: this.libraryDir, tracks: this.files.length });
    return this.files.length;
  }

  size(): number {
    return this.files.length;
  }

  upcoming(): PlayRequest | null {
    return this.buffer[0]?.request ?? null;
  }

  /**
   * Hands out the current item. The item after it is located and announced
   * through `checkNext` before this resolves, so lookahead metadata is ready
   * by the time the returned item starts playing.
   */
  async next(): Promise<PlayRequest> {
    await this.fillAndAnnounce();
    const current = this.buffer.shift();
    if (!current) {
      throw new Error(`No playable tracks in ${this.libraryDir}`);
    }
    this.lastFile = current.request.filePath;
    await this.fillAndAnnounce();
    return current.request;
  }

  private async fillAndAnnounce(): Promise<void> {
    // Every file may be rejected once before we give up on this round.
    let attempts = this.files.length * 2 + this.prefetch;
    while (attempts > 0) {
      attempts -= 1;
      while (this.buffer.length < this.prefetch) {
        const located = await this.locateNext();
        if (!located) return;
        this.buffer.push({ request: located, announced: false });
      }

      const head = this.buffer[0];
      if (!head || head.announced) return;
      const accepted = this.opts.checkNext ? await this.opts.checkNext(head.request) : true;
      if (accepted) {
        head.announced = true;
        return;
      }
      logWarn("playlist.candidate.rejected", { filePath: head.request.filePath });
      this.buffer.shift();
    }
  }

  private async locateNext(): Promise<PlayRequest | null> {
    for (let tries = 0; tries < this.files.length; tries += 1) {
      const filePath = this.pickFile();
      if (!filePath) return null;
      try {
        await access(filePath);
      } catch {
        logWarn("playlist.file.missing", { filePath });
        continue;
      }
      this.requestCounter += 1;
      return {
        id: `library-${this.requestCounter}`,
        kind: "library",
        filePath
      };
    }
    return null;
  }

  private pickFile(): string | null {
    if (!this.files.length) return null;
    if (this.ptr >= this.order.length) {
      this.resetOrder();
    }
    const idx = this.order[this.ptr];
    this.ptr += 1;
    return this.files[idx] ?? null;
  }

  private resetOrder(): void {
    const n = this.files.length;
    this.order = Array.from({ length: n }, (_, i) => i);
    for (let i = n - 1; i > 0; i -= 1) {
      const j = Math.floor(this.random() * (i + 1));
      const a = this.order[i];
      this.order[i] = this.order[j];
      this.order[j] = a;
    }

    // Avoid the same file twice in a row across a reshuffle.
    const recent = this.buffer[this.buffer.length - 1]?.request.filePath ?? this.lastFile;
    if (n > 1 && recent && this.files[this.order[0]] === recent) {
      const swapIdx = 1 + Math.floor(this.random() * (n - 1));
      const tmp = this.order[0];
      this.order[0] = this.order[swapIdx];
      this.order[swapIdx] = tmp;
    }
    this.ptr = 0;
  }
}
