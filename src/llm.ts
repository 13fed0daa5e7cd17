import { z } from "zod";
import { ServiceError } from "./errors";
import { errorMessage } from "./log";
import type { TrackMetadata } from "./types";

const SYSTEM_PROMPT = "You are a helpful assistant.";

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().trim().min(1)
        })
      })
    )
    .length(1)
});

export function describeTrack(track: TrackMetadata): string {
  const title = track.title || track.filename;
  const artist = track.artist || "an unknown artist";
  return `${title} by ${artist}`;
}

export function buildNarrationPrompt(history: readonly TrackMetadata[], next: TrackMetadata | null): string {
  const played = history.map(describeTrack).join(", ");
  const upcoming = next ? describeTrack(next) : "a surprise track";

  return `You are the host of a music stream that never stops playing.
The songs that just played were: ${played}.
The next song is ${upcoming}.

Write a short, entertaining radio segment of about 200 words about the songs that just played.
Talk about their musical style, the year they came out, the instruments that stand out and their cultural context.
End the segment by introducing the next song.
Return only the words to be spoken, with no headings, stage directions or emojis.`;
}

export type ChatServiceOptions = {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  fetchFn?: typeof fetch;
};

export class NarrationWriter {
  private readonly fetchFn: typeof fetch;

  constructor(private readonly opts: ChatServiceOptions) {
    this.fetchFn = opts.fetchFn ?? fetch;
  }

  async write(prompt: string): Promise<string> {
    const res = await this.fetchFn(`${this.opts.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.opts.apiKey}`
      },
      body: JSON.stringify({
        model: this.opts.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: prompt }
        ]
      }),
      signal: AbortSignal.timeout(this.opts.timeoutMs)
    });

    if (res.status !== 200) {
      throw new ServiceError("chat", "status", `HTTP ${res.status} ${await res.text()}`, res.status);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (error) {
      throw new ServiceError("chat", "malformed", `response is not JSON (${errorMessage(error)})`, res.status);
    }

    const parsed = completionSchema.safeParse(body);
    if (!parsed.success) {
      throw new ServiceError("chat", "malformed", `unexpected completion shape: ${parsed.error.issues[0]?.message ?? "invalid"}`, res.status);
    }
    return parsed.data.choices[0].message.content;
  }
}
