import test from "node:test";
import assert from "node:assert/strict";
import { mkdir, mkdtemp, unlink, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { LibraryPlaylist } from "../src/playlist";
import type { PlayRequest } from "../src/types";

async function library(names: string[]): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "playlist-test-"));
  for (const name of names) {
    const filePath = path.join(dir, name);
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, "audio");
  }
  return dir;
}

test("load finds audio files recursively and ignores everything else", async () => {
  const dir = await library(["a.mp3", "b.MP3", "c.flac", "notes.txt", "sub/d.ogg"]);
  const playlist = new LibraryPlaylist(dir);

  assert.equal(await playlist.load(), 4);
});

test("the upcoming item is announced before the current one is handed out", async () => {
  const dir = await library(["a.mp3", "b.mp3", "c.mp3"]);
  const announced: PlayRequest[] = [];
  const playlist = new LibraryPlaylist(dir, {
    checkNext: async (request) => {
      announced.push(request);
      return true;
    }
  });
  await playlist.load();

  for (let k = 0; k < 7; k += 1) {
    const current = await playlist.next();
    assert.equal(current.id, announced[k]?.id);
    assert.equal(announced.length, k + 2);
    assert.equal(playlist.upcoming()?.id, announced[k + 1]?.id);
  }
});

test("deeper prefetch still announces only the immediate next item", async () => {
  const dir = await library(["a.mp3", "b.mp3", "c.mp3", "d.mp3"]);
  const announced: string[] = [];
  const playlist = new LibraryPlaylist(dir, {
    prefetch: 3,
    checkNext: async (request) => {
      announced.push(request.id);
      return true;
    }
  });
  await playlist.load();

  const first = await playlist.next();
  const second = await playlist.next();

  assert.deepEqual(announced, [first.id, second.id, playlist.upcoming()?.id]);
});

test("rejected candidates are skipped", async () => {
  const dir = await library(["keep-1.mp3", "skip.mp3", "keep-2.mp3"]);
  const playlist = new LibraryPlaylist(dir, {
    checkNext: async (request) => !request.filePath.endsWith("skip.mp3")
  });
  await playlist.load();

  for (let i = 0; i < 8; i += 1) {
    const current = await playlist.next();
    assert.notEqual(path.basename(current.filePath), "skip.mp3");
  }
});

test("consecutive items never repeat across reshuffles", async () => {
  const dir = await library(["a.mp3", "b.mp3", "c.mp3"]);
  const playlist = new LibraryPlaylist(dir);
  await playlist.load();

  let previous = "";
  for (let i = 0; i < 30; i += 1) {
    const current = await playlist.next();
    assert.notEqual(current.filePath, previous);
    previous = current.filePath;
  }
});

test("files removed after loading are skipped", async () => {
  const dir = await library(["a.mp3", "gone.mp3", "c.mp3"]);
  const playlist = new LibraryPlaylist(dir);
  await playlist.load();
  await unlink(path.join(dir, "gone.mp3"));

  for (let i = 0; i < 6; i += 1) {
    const current = await playlist.next();
    assert.notEqual(path.basename(current.filePath), "gone.mp3");
  }
});

test("an empty library cannot produce a request", async () => {
  const dir = await library(["readme.txt"]);
  const playlist = new LibraryPlaylist(dir);

  assert.equal(await playlist.load(), 0);
  await assert.rejects(playlist.next(), /No playable tracks/);
});
