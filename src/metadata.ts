import path from "node:path";
import { parseFile, type IAudioMetadata } from "music-metadata";
import type { TrackMetadata } from "./types";

export type ParsedTags = {
  common: Pick<IAudioMetadata["common"], "title" | "artist" | "album" | "year" | "picture">;
  format: Pick<IAudioMetadata["format"], "duration">;
};

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function toTrackMetadata(filePath: string, parsed: ParsedTags): TrackMetadata {
  const meta: TrackMetadata = { filename: path.basename(filePath) };

  const title = nonBlank(parsed.common.title);
  const artist = nonBlank(parsed.common.artist);
  const album = nonBlank(parsed.common.album);
  if (title) meta.title = title;
  if (artist) meta.artist = artist;
  if (album) meta.album = album;
  if (typeof parsed.common.year === "number") meta.year = parsed.common.year;

  const duration = parsed.format.duration;
  if (typeof duration === "number" && Number.isFinite(duration) && duration > 0) {
    meta.durationSec = duration;
  }

  const picture = parsed.common.picture?.[0];
  if (picture && picture.data.length > 0) {
    meta.cover = { mime: picture.format, data: picture.data };
  }

  return meta;
}

export async function readTrackMetadata(filePath: string): Promise<TrackMetadata> {
  const parsed = await parseFile(filePath);
  return toTrackMetadata(filePath, parsed);
}
