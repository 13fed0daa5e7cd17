import test from "node:test";
import assert from "node:assert/strict";
import { loadConfig } from "../src/config";

test("loadConfig fills defaults around the api key", () => {
  const config = loadConfig({ OPENAI_API_KEY: "test-key", WORK_DIR: "/tmp/ns-work" });

  assert.equal(config.openai.apiKey, "test-key");
  assert.equal(config.openai.baseUrl, "https://api.openai.com/v1");
  assert.equal(config.openai.chatModel, "gpt-4o-mini");
  assert.equal(config.openai.ttsModel, "tts-1");
  assert.equal(config.openai.voice, "onyx");
  assert.equal(config.openai.format, "mp3");
  assert.equal(config.openai.requestTimeoutMs, 30000);
  assert.equal(config.narrateEveryNTracks, 4);
  assert.equal(config.prefetch, 1);
  assert.equal(config.hlsDir, "/tmp/ns-work/hls");
});

test("loadConfig coerces numbers and trims the base url", () => {
  const config = loadConfig({
    OPENAI_API_KEY: "test-key",
    OPENAI_BASE_URL: "http://localhost:8080/v1/",
    NARRATE_EVERY_N_TRACKS: "6",
    PORT: "8081",
    NARRATOR_SPEED: "1.25"
  });

  assert.equal(config.openai.baseUrl, "http://localhost:8080/v1");
  assert.equal(config.narrateEveryNTracks, 6);
  assert.equal(config.port, 8081);
  assert.equal(config.openai.speed, 1.25);
});

test("loadConfig rejects a missing api key", () => {
  assert.throws(() => loadConfig({}), /Invalid configuration: OPENAI_API_KEY/);
});

test("loadConfig rejects a zero batch size", () => {
  assert.throws(() => loadConfig({ OPENAI_API_KEY: "test-key", NARRATE_EVERY_N_TRACKS: "0" }), /NARRATE_EVERY_N_TRACKS/);
});
