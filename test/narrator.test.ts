import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { NarrationWriter } from "../src/llm";
import { NARRATION_TITLE, Narrator } from "../src/narrator";
import { SpeechClient } from "../src/tts";

function servicesFetch(prompts: string[], speechInputs: string[]): typeof fetch {
  return async (input, init) => {
    const body = JSON.parse(String(init?.body));
    if (String(input).endsWith("/chat/completions")) {
      prompts.push(body.messages[1].content);
      return new Response(JSON.stringify({ choices: [{ message: { content: "What a run of songs." } }] }), { status: 200 });
    }
    speechInputs.push(body.input);
    return new Response(new Uint8Array([7, 7, 7]), { status: 200 });
  };
}

function narrator(fetchFn: typeof fetch, workDir: string): Narrator {
  const writer = new NarrationWriter({ apiKey: "test-key", baseUrl: "http://api.test/v1", model: "m", timeoutMs: 1000, fetchFn });
  const speech = new SpeechClient({
    apiKey: "test-key",
    baseUrl: "http://api.test/v1",
    model: "tts-1",
    voice: "onyx",
    speed: 1,
    format: "mp3",
    timeoutMs: 1000,
    fetchFn
  });
  return new Narrator(writer, speech, workDir);
}

test("generateNarration voices the written text into a narration request", async () => {
  const workDir = await mkdtemp(path.join(os.tmpdir(), "narrator-test-"));
  const prompts: string[] = [];
  const speechInputs: string[] = [];

  const request = await narrator(servicesFetch(prompts, speechInputs), workDir).generateNarration(
    [
      { filename: "a.mp3", title: "A", artist: "X" },
      { filename: "b.mp3", title: "B", artist: "Y" }
    ],
    { filename: "c.mp3", title: "C", artist: "Z" }
  );

  assert.equal(request.kind, "narration");
  assert.equal(request.title, NARRATION_TITLE);
  assert.equal(path.dirname(request.filePath), workDir);
  assert.equal(path.extname(request.filePath), ".mp3");
  assert.deepEqual(await readFile(request.filePath), Buffer.from([7, 7, 7]));
  assert.equal(prompts.length, 1);
  assert.ok(prompts[0]?.includes("A by X, B by Y"));
  assert.deepEqual(speechInputs, ["What a run of songs."]);
});

test("narrate skips speech when the chat call fails", async () => {
  const workDir = await mkdtemp(path.join(os.tmpdir(), "narrator-test-"));
  let speechCalls = 0;
  const fetchFn: typeof fetch = async (input) => {
    if (String(input).endsWith("/audio/speech")) speechCalls += 1;
    return new Response("boom", { status: 500 });
  };

  await assert.rejects(narrator(fetchFn, workDir).narrate("prompt"), /chat service: HTTP 500/);
  assert.equal(speechCalls, 0);
});
