import path from "node:path";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";

loadDotenv({ path: process.env.DOTENV_PATH || path.resolve(process.cwd(), ".env") });

const envSchema = z.object({
  OPENAI_API_KEY: z.string().min(1),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_CHAT_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_TTS_MODEL: z.string().min(1).default("tts-1"),
  NARRATOR_VOICE: z.string().min(1).default("onyx"),
  NARRATOR_SPEED: z.coerce.number().min(0.25).max(4).default(1),
  NARRATION_FORMAT: z.enum(["mp3", "opus", "aac", "flac", "wav"]).default("mp3"),
  AUDIO_DIR: z.string().min(1).default(path.resolve(process.cwd(), "audio")),
  DEFAULT_COVER_PATH: z.string().min(1).default(path.resolve(process.cwd(), "assets/default-cover.png")),
  WORK_DIR: z.string().min(1).default("/tmp/narrated-stream"),
  HLS_DIR: z.string().min(1).optional(),
  PORT: z.coerce.number().int().positive().default(3000),
  NARRATE_EVERY_N_TRACKS: z.coerce.number().int().min(1).default(4),
  PREFETCH: z.coerce.number().int().min(1).default(1),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MAX_CONCURRENT_NARRATIONS: z.coerce.number().int().min(1).default(2)
});

export type NarrationFormat = z.infer<typeof envSchema>["NARRATION_FORMAT"];

export type AppConfig = {
  port: number;
  openai: {
    apiKey: string;
    baseUrl: string;
    chatModel: string;
    ttsModel: string;
    voice: string;
    speed: number;
    format: NarrationFormat;
    requestTimeoutMs: number;
  };
  audioDir: string;
  defaultCoverPath: string;
  workDir: string;
  hlsDir: string;
  narrateEveryNTracks: number;
  prefetch: number;
  maxConcurrentNarrations: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    openai: {
      apiKey: e.OPENAI_API_KEY,
      baseUrl: e.OPENAI_BASE_URL.replace(/\/+$/, ""),
      chatModel: e.OPENAI_CHAT_MODEL,
      ttsModel: e.OPENAI_TTS_MODEL,
      voice: e.NARRATOR_VOICE,
      speed: e.NARRATOR_SPEED,
      format: e.NARRATION_FORMAT,
      requestTimeoutMs: e.REQUEST_TIMEOUT_MS
    },
    audioDir: path.resolve(e.AUDIO_DIR),
    defaultCoverPath: path.resolve(e.DEFAULT_COVER_PATH),
    workDir: path.resolve(e.WORK_DIR),
    hlsDir: path.resolve(e.HLS_DIR || path.join(e.WORK_DIR, "hls")),
    narrateEveryNTracks: e.NARRATE_EVERY_N_TRACKS,
    prefetch: e.PREFETCH,
    maxConcurrentNarrations: e.MAX_CONCURRENT_NARRATIONS
  };
}
