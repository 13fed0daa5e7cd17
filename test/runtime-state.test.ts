import test from "node:test";
import assert from "node:assert/strict";
import { RuntimeState } from "../src/runtime-state";
import type { StationEvent } from "../src/types";

const library = { id: "library-1", kind: "library" as const, filePath: "/music/a.mp3" };
const narration = { id: "narration-1", kind: "narration" as const, filePath: "/tmp/n.mp3", title: "AI DJ narration" };

test("runtime state tracks library and narration playback", () => {
  const runtime = new RuntimeState("/assets/default.png");

  runtime.trackStarted(library, { filename: "a.mp3", title: "A", artist: "X", durationSec: 180 });
  runtime.setDisplay({ title: "A", artist: "X" });
  let snap = runtime.snapshot();
  assert.equal(snap.nowPlaying?.requestId, "library-1");
  assert.equal(snap.nowPlaying?.durationSec, 180);
  assert.deepEqual(snap.display, { title: "A", artist: "X", coverPath: "/assets/default.png", position: 0 });

  runtime.trackFinished(library);
  runtime.narrationTriggered({ seq: 1, prompt: "p", triggeredAt: "2026-01-01T00:00:00.000Z" });
  runtime.narrationQueued({ ...narration, seq: 1 });
  snap = runtime.snapshot();
  assert.equal(snap.nowPlaying, null);
  assert.deepEqual(snap.injectionQueue, [{ seq: 1, id: "narration-1", filePath: "/tmp/n.mp3" }]);

  runtime.trackStarted(narration, { filename: "n.mp3" });
  snap = runtime.snapshot();
  assert.equal(snap.nowPlaying?.title, "AI DJ narration");
  assert.deepEqual(snap.injectionQueue, []);
  assert.equal(snap.display.title, "A");

  runtime.trackFinished(narration);
  snap = runtime.snapshot();
  assert.equal(snap.stats.tracksPlayed, 1);
  assert.equal(snap.stats.narrationsPlayed, 1);
  assert.equal(snap.stats.narrationsTriggered, 1);
  assert.equal(snap.stats.narrationsQueued, 1);
});

test("runtime state records failures and cover fallbacks", () => {
  const runtime = new RuntimeState("/assets/default.png");

  runtime.narrationFailed({ seq: 3, prompt: "p", triggeredAt: "2026-01-01T00:00:00.000Z" }, "chat service: HTTP 500");
  runtime.coverChanged({ kind: "extracted", path: "/tmp/cover-1.png", generation: 1 });
  runtime.coverChanged({ kind: "default", path: "/assets/default.png", reason: "no_cover" });

  const snap = runtime.snapshot();
  assert.equal(snap.stats.generationFailures, 1);
  assert.equal(snap.stats.coverFallbacks, 1);
  assert.equal(snap.display.coverPath, "/assets/default.png");
  assert.equal(snap.recentErrors[0]?.source, "narration");
  assert.equal(snap.recentErrors[0]?.message, "chat service: HTTP 500");
});

test("position updates are clamped and kept out of event history", () => {
  const runtime = new RuntimeState("/assets/default.png");
  const received: StationEvent[] = [];
  runtime.subscribe((event) => received.push(event));

  runtime.setPosition(0.005);
  assert.equal(runtime.snapshot().display.position, 0);

  runtime.setPosition(0.5);
  runtime.setPosition(3);
  const snap = runtime.snapshot();
  assert.equal(snap.display.position, 1);
  assert.deepEqual(received.map((e) => e.event), ["transport.progress", "transport.progress"]);
  assert.equal(snap.recentEvents.length, 0);
});

test("runtime state event history is bounded", () => {
  const runtime = new RuntimeState("/assets/default.png");

  for (let i = 0; i < 250; i += 1) {
    runtime.setDisplay({ title: `T${i}`, artist: "A" });
  }

  const snap = runtime.snapshot();
  assert.equal(snap.recentEvents.length, 200);
  assert.equal(snap.recentEvents[0]?.payload.title, "T249");
});

test("unsubscribe stops delivery", () => {
  const runtime = new RuntimeState("/assets/default.png");
  let count = 0;
  const unsubscribe = runtime.subscribe(() => {
    count += 1;
  });

  runtime.setRunning(true);
  unsubscribe();
  runtime.setRunning(false);

  assert.equal(count, 1);
});
