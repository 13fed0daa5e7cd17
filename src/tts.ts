import { open } from "node:fs/promises";
import { ServiceError } from "./errors";
import { logError } from "./log";
import type { NarrationFormat } from "./config";

export type SpeechServiceOptions = {
  apiKey: string;
  baseUrl: string;
  model: string;
  voice: string;
  speed: number;
  format: NarrationFormat;
  timeoutMs: number;
  fetchFn?: typeof fetch;
};

export class SpeechClient {
  private readonly fetchFn: typeof fetch;

  constructor(private readonly opts: SpeechServiceOptions) {
    this.fetchFn = opts.fetchFn ?? fetch;
  }

  get format(): NarrationFormat {
    return this.opts.format;
  }

  /**
   * Streams the synthesized audio into `outFile` as chunks arrive.
   * On failure mid-stream the partial file stays on disk.
   */
  async synthToFile(text: string, outFile: string): Promise<number> {
    const res = await this.fetchFn(`${this.opts.baseUrl}/audio/speech`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.opts.apiKey}`
      },
      body: JSON.stringify({
        model: this.opts.model,
        input: text,
        voice: this.opts.voice,
        response_format: this.opts.format,
        speed: this.opts.speed
      }),
      signal: AbortSignal.timeout(this.opts.timeoutMs)
    });

    if (res.status !== 200) {
      throw new ServiceError("speech", "status", `HTTP ${res.status} ${await res.text()}`, res.status);
    }
    if (!res.body) {
      throw new ServiceError("speech", "malformed", "response has no body", res.status);
    }

    const handle = await open(outFile, "w");
    const reader = res.body.getReader();
    let bytes = 0;
    let drained = false;
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          drained = true;
          break;
        }
        await handle.write(value);
        bytes += value.byteLength;
      }
    } finally {
      if (!drained) {
        // Release the connection instead of leaving it open until the timeout.
        await reader.cancel().catch((error: unknown) => logError("speech.body.cancel_failed", error));
      }
      await handle.close();
    }
    return bytes;
  }
}
