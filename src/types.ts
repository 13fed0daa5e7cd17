export type EmbeddedCover = {
  mime: string;
  data: Uint8Array;
};

export type TrackMetadata = {
  filename: string;
  title?: string;
  artist?: string;
  album?: string;
  year?: number;
  durationSec?: number;
  cover?: EmbeddedCover;
};

export type RequestKind = "library" | "narration";

export type PlayRequest = {
  id: string;
  kind: RequestKind;
  filePath: string;
  title?: string;
};

export type InjectedRequest = PlayRequest & {
  seq: number;
};

export type NarrationTask = {
  seq: number;
  prompt: string;
  triggeredAt: string;
};

export type CoverFallbackReason = "no_cover" | "unknown_mime" | "write_failed" | "closed";

export type CoverResult =
  | { kind: "extracted"; path: string; generation: number }
  | { kind: "default"; path: string; reason: CoverFallbackReason };

export type MetadataReader = (filePath: string) => Promise<TrackMetadata>;

export type RequestMetadataReader = (request: PlayRequest) => Promise<TrackMetadata>;

export type BatchHandler = (history: TrackMetadata[], next: TrackMetadata | null) => void;

export interface RequestSource {
  next(): Promise<PlayRequest>;
}

export type NowPlaying = {
  requestId: string;
  kind: RequestKind;
  title: string;
  artist: string;
  durationSec: number | null;
  startedAt: string;
};

export type DisplayState = {
  title: string;
  artist: string;
  coverPath: string;
  position: number;
};

export type StationStats = {
  tracksPlayed: number;
  narrationsPlayed: number;
  narrationsTriggered: number;
  narrationsQueued: number;
  generationFailures: number;
  coverFallbacks: number;
};

export type SystemErrorItem = {
  ts: string;
  source: string;
  message: string;
};

export type StationEvent = {
  ts: string;
  event: string;
  payload: Record<string, unknown>;
  snapshot?: StationSnapshot;
};

export type QueuedNarration = {
  seq: number;
  id: string;
  filePath: string;
};

export type StationSnapshot = {
  running: boolean;
  startedAt: string | null;
  nowPlaying: NowPlaying | null;
  display: DisplayState;
  upcoming: { title: string; artist: string } | null;
  historyLength: number;
  injectionQueue: QueuedNarration[];
  stats: StationStats;
  recentEvents: StationEvent[];
  recentErrors: SystemErrorItem[];
};
