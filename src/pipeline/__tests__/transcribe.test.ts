import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { MockAgent } from "undici";
import { afterEach, describe, expect, it } from "vitest";
import { normalizeWhisperCppJson, WhisperCppEngine } from "../transcribe.js";
import { LocalAsrEngine, normalizeLocalAsrResponse } from "../transcribe_local.js";

describe("normalizeWhisperCppJson", () => {
  it("reads millisecond offsets and keeps one cue per entry", () => {
    const raw = {
      result: { language: "en" },
      transcription: [
        { timestamps: { from: "00:00:00,000", to: "00:00:01,500" }, offsets: { from: 0, to: 1500 }, text: " Hi" },
        { offsets: { from: 1500, to: 2000 }, text: "  " },
      ],
    };
    expect(normalizeWhisperCppJson(raw)).toEqual({
      language: "en",
      segments: [
        { startMs: 0, endMs: 1500, text: "Hi" },
        { startMs: 1500, endMs: 2000, text: "" },
      ],
    });
  });

  it("rejects output without a transcription", () => {
    expect(() => normalizeWhisperCppJson({ result: {} })).toThrow();
  });
});

describe("WhisperCppEngine", () => {
  it("fails init when the model file is missing", async () => {
    const engine = new WhisperCppEngine({ command: "whisper-cli", model: "ggml-missing.bin", modelsDir: "/nonexistent" });
    await expect(engine.init()).rejects.toThrow("Model weights not found at /nonexistent/ggml-missing.bin");
  });
});

describe("normalizeLocalAsrResponse", () => {
  it("converts seconds to milliseconds", () => {
    const raw = {
      text: "Hello",
      language: "en",
      segments: [
        { start: 0.5, end: 1.25, text: " Hello " },
        { start: 1.25, end: 2, text: "" },
      ],
    };
    expect(normalizeLocalAsrResponse(raw)).toEqual({
      language: "en",
      segments: [
        { startMs: 500, endMs: 1250, text: "Hello" },
        { startMs: 1250, endMs: 2000, text: "" },
      ],
    });
  });
});

describe("LocalAsrEngine", () => {
  const origin = "http://asr.test";
  let agent: MockAgent | undefined;

  afterEach(async () => {
    await agent?.close();
  });

  it("checks health and posts the audio", async () => {
    agent = new MockAgent();
    agent.disableNetConnect();
    const pool = agent.get(origin);
    pool.intercept({ path: "/healthz", method: "GET" }).reply(200, { ok: true });
    pool
      .intercept({ path: "/openai/v1/audio/transcriptions", method: "POST" })
      .reply(200, { language: "es", segments: [{ start: 0, end: 1, text: "Hola" }] });

    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "asr-"));
    const wav = path.join(dir, "audio_16k_mono.wav");
    fs.writeFileSync(wav, Buffer.alloc(64));

    const engine = new LocalAsrEngine({ baseUrl: origin, model: "test-model", timeoutMs: 1000, dispatcher: agent });
    const progress: (number | null)[] = [];
    await engine.init();
    const result = await engine.transcribe({ path: wav, sampleRate: 16000, channels: 1 }, "es", {
      onProgress: (f) => progress.push(f),
    });

    expect(result).toEqual({ language: "es", segments: [{ startMs: 0, endMs: 1000, text: "Hola" }] });
    expect(progress).toEqual([null, 1]);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("fails init when the service is unhealthy", async () => {
    agent = new MockAgent();
    agent.disableNetConnect();
    agent.get(origin).intercept({ path: "/healthz", method: "GET" }).reply(503, "loading");

    const engine = new LocalAsrEngine({ baseUrl: origin, model: "test-model", timeoutMs: 1000, dispatcher: agent });
    await expect(engine.init()).rejects.toThrow("Local ASR service health check failed: 503");
  });
});
