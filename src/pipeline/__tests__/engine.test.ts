import { describe, expect, it } from "vitest";
import { TranscriptionError } from "../../errors.js";
import { loadLanguageCodes, TranscriptionAdapter, wrapEngine, type EngineResult, type RecognitionEngine } from "../engine.js";
import type { AudioHandle } from "../extract.js";

const audio: AudioHandle = { path: "/tmp/audio_16k_mono.wav", sampleRate: 16000, channels: 1 };

class FakeEngine implements RecognitionEngine {
  readonly kind = "custom" as const;
  readonly model = "fake";
  readonly reportsProgress = true;
  inits = 0;
  readonly languages: (string | undefined)[] = [];

  constructor(private readonly result: EngineResult | Error, private initError?: Error) {}

  async init(): Promise<void> {
    this.inits += 1;
    if (this.initError) {
      const err = this.initError;
      this.initError = undefined;
      throw err;
    }
  }

  async transcribe(_audio: AudioHandle, language: string | undefined): Promise<EngineResult> {
    this.languages.push(language);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

const languages = new Set(["en", "es"]);
const result: EngineResult = { language: "en", segments: [{ startMs: 0, endMs: 900, text: "  hi there " }] };

describe("TranscriptionAdapter", () => {
  it("rejects unknown language codes before touching the engine", async () => {
    const engine = new FakeEngine(result);
    const adapter = new TranscriptionAdapter(wrapEngine(engine, languages));
    await expect(adapter.transcribe(audio, "xx")).rejects.toThrow(new TranscriptionError("Unsupported language code: xx"));
    expect(engine.inits).toBe(0);
  });

  it("maps auto to detection and normalizes codes", async () => {
    const engine = new FakeEngine(result);
    const adapter = new TranscriptionAdapter(wrapEngine(engine, languages));

    const first = await adapter.transcribe(audio, "auto");
    await adapter.transcribe(audio, "EN");

    expect(engine.languages).toEqual([undefined, "en"]);
    expect(engine.inits).toBe(1);
    expect(first).toEqual({ language: "en", segments: [{ startMs: 0, endMs: 900, text: "hi there" }] });
  });

  it("reports a failed init and retries it next time", async () => {
    const engine = new FakeEngine(result, new Error("no weights"));
    const adapter = new TranscriptionAdapter(wrapEngine(engine, languages));

    await expect(adapter.transcribe(audio, "en")).rejects.toThrow("Engine initialization failed (custom/fake): no weights");
    await expect(adapter.transcribe(audio, "en")).resolves.toMatchObject({ language: "en" });
    expect(engine.inits).toBe(2);
  });

  it("wraps engine crashes", async () => {
    const adapter = new TranscriptionAdapter(wrapEngine(new FakeEngine(new Error("segfault")), languages));
    const error = await adapter.transcribe(audio, "es").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TranscriptionError);
    expect(error).toMatchObject({ message: "Transcription failed: segfault", stage: "transcribe" });
  });

  it("reports cancellation instead of a crash", async () => {
    const controller = new AbortController();
    controller.abort();
    const adapter = new TranscriptionAdapter(wrapEngine(new FakeEngine(result), languages));
    await expect(adapter.transcribe(audio, "en", { signal: controller.signal })).rejects.toMatchObject({ code: "CANCELLED" });
  });
});

describe("loadLanguageCodes", () => {
  it("reads the language table", () => {
    const codes = loadLanguageCodes();
    expect(codes.has("en")).toBe(true);
    expect(codes.has("yue")).toBe(true);
    expect(codes.has("auto")).toBe(false);
  });
});
