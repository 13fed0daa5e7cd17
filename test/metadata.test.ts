import test from "node:test";
import assert from "node:assert/strict";
import { toTrackMetadata } from "../src/metadata";

test("toTrackMetadata maps tags, duration and the first picture", () => {
  const cover = Buffer.from([0x89, 0x50, 0x4e, 0x47]);
  const meta = toTrackMetadata("/music/rock/song.mp3", {
    common: {
      title: " Song ",
      artist: "Artist",
      album: "",
      year: 1999,
      picture: [
        { format: "image/png", data: cover },
        { format: "image/jpeg", data: Buffer.from([1]) }
      ]
    },
    format: { duration: 200.5 }
  });

  assert.deepEqual(meta, {
    filename: "song.mp3",
    title: "Song",
    artist: "Artist",
    year: 1999,
    durationSec: 200.5,
    cover: { mime: "image/png", data: cover }
  });
});

test("toTrackMetadata keeps only the filename when tags are absent", () => {
  const meta = toTrackMetadata("/music/untagged.flac", {
    common: { picture: [{ format: "image/png", data: Buffer.alloc(0) }] },
    format: {}
  });

  assert.deepEqual(meta, { filename: "untagged.flac" });
});
