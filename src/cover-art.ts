import { access, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { errorMessage, log, logError, logWarn } from "./log";
import type { CoverFallbackReason, CoverResult, TrackMetadata } from "./types";

const MIME_EXTENSIONS: Record<string, string> = {
  "image/jpeg": "jpg",
  "image/jpg": "jpg",
  "image/pjpeg": "jpg",
  "image/png": "png",
  "image/gif": "gif",
  "image/webp": "webp",
  "image/bmp": "bmp"
};

export function extensionForMime(mime: string): string | null {
  return MIME_EXTENSIONS[mime.trim().toLowerCase()] ?? null;
}

/**
 * Keeps exactly one live cover image on disk. Every extraction writes a new
 * generation-numbered file into a private temp directory, makes it current,
 * then deletes the file it replaced. Swaps run one at a time in call order.
 */
export class CoverArtManager {
  private dir: string | null = null;
  private closed = false;
  private currentPath: string;
  private generation = 0;
  private chain: Promise<unknown> = Promise.resolve();

  constructor(private readonly defaultCoverPath: string) {
    this.currentPath = defaultCoverPath;
  }

  /** Opens the manager, or reopens it after `close()`. */
  async init(): Promise<string> {
    this.closed = false;
    return this.ensureDir();
  }

  current(): string {
    return this.currentPath;
  }

  directory(): string | null {
    return this.dir;
  }

  extract(metadata: TrackMetadata): Promise<CoverResult> {
    const run = this.chain.then(() => this.swap(metadata));
    this.chain = run;
    return run;
  }

  close(): Promise<void> {
    const run = this.chain.then(() => this.teardown());
    this.chain = run;
    return run;
  }

  private async teardown(): Promise<void> {
    this.closed = true;
    const dir = this.dir;
    this.dir = null;
    this.currentPath = this.defaultCoverPath;
    if (!dir) return;
    try {
      await rm(dir, { recursive: true, force: true });
      log("cover.dir.removed", { dir });
    } catch (error) {
      logError("cover.dir.remove_failed", error, { dir });
    }
  }

  private async swap(metadata: TrackMetadata): Promise<CoverResult> {
    const result = await this.materialize(metadata);
    const previous = this.currentPath;
    this.currentPath = result.path;
    if (previous !== result.path) {
      await this.release(previous);
    }
    return result;
  }

  private async ensureDir(): Promise<string> {
    if (this.dir) {
      try {
        await access(this.dir);
        return this.dir;
      } catch (error) {
        logWarn("cover.dir.missing", { dir: this.dir, error: errorMessage(error) });
        this.dir = null;
      }
    }
    const dir = await mkdtemp(path.join(os.tmpdir(), "cover-art-"));
    this.dir = dir;
    log("cover.dir.created", { dir });
    return dir;
  }

  private async materialize(metadata: TrackMetadata): Promise<CoverResult> {
    if (this.closed) {
      return this.fallback("closed");
    }
    const cover = metadata.cover;
    if (!cover) {
      return this.fallback("no_cover");
    }

    const ext = extensionForMime(cover.mime);
    if (!ext) {
      logWarn("cover.mime.unknown", { mime: cover.mime, filename: metadata.filename });
      return this.fallback("unknown_mime");
    }

    let dir: string;
    try {
      dir = await this.ensureDir();
    } catch (error) {
      logError("cover.dir.create_failed", error, { filename: metadata.filename });
      return this.fallback("write_failed");
    }

    const generation = this.generation + 1;
    const target = path.join(dir, `cover-${generation}.${ext}`);
    try {
      await writeFile(target, cover.data);
    } catch (error) {
      logError("cover.write.failed", error, { filename: metadata.filename, target });
      await this.release(target);
      return this.fallback("write_failed");
    }
    this.generation = generation;
    return { kind: "extracted", path: target, generation };
  }

  private fallback(reason: CoverFallbackReason): CoverResult {
    return { kind: "default", path: this.defaultCoverPath, reason };
  }

  private owns(filePath: string): boolean {
    return this.dir !== null && filePath !== this.defaultCoverPath && path.dirname(filePath) === this.dir;
  }

  private async release(filePath: string): Promise<void> {
    if (!this.owns(filePath)) return;
    try {
      await rm(filePath, { force: true });
    } catch (error) {
      logError("cover.delete.failed", error, { filePath });
    }
  }
}
