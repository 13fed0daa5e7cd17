import path from "node:path";
import { randomUUID } from "node:crypto";
import { buildNarrationPrompt, type NarrationWriter } from "./llm";
import type { SpeechClient } from "./tts";
import { log } from "./log";
import type { PlayRequest, TrackMetadata } from "./types";

export const NARRATION_TITLE = "AI DJ narration";

export interface NarrationGenerator {
  narrate(prompt: string): Promise<PlayRequest>;
}

export class Narrator implements NarrationGenerator {
  constructor(
    private readonly writer: NarrationWriter,
    private readonly speech: SpeechClient,
    private readonly workDir: string
  ) {}

  async generateNarration(history: readonly TrackMetadata[], next: TrackMetadata | null): Promise<PlayRequest> {
    return this.narrate(buildNarrationPrompt(history, next));
  }

  async narrate(prompt: string): Promise<PlayRequest> {
    const text = await this.writer.write(prompt);
    const id = randomUUID();
    const outFile = path.join(this.workDir, `narration-${id}.${this.speech.format}`);
    const bytes = await this.speech.synthToFile(text, outFile);
    log("narration.synthesized", { outFile, bytes, chars: text.length });
    return {
      id: `narration-${id}`,
      kind: "narration",
      filePath: outFile,
      title: NARRATION_TITLE
    };
  }
}
