import fs from "node:fs";
import path from "node:path";
import { fetch, FormData, type Dispatcher } from "undici";
import { z } from "zod";
import type { TimedText } from "../types.js";
import { linkSignals } from "../utils/signal.js";
import type { AudioHandle } from "./extract.js";
import type { EngineResult, EngineRunOptions, RecognitionEngine } from "./engine.js";

export interface LocalAsrOptions {
  baseUrl: string; // e.g., http://localhost:5689
  model: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

// OpenAI-compatible verbose_json: text, language, duration and segments in seconds
const VerboseJsonSchema = z.object({
  text: z.string().optional(),
  language: z.string().optional(),
  duration: z.number().optional(),
  segments: z
    .array(z.object({ start: z.number(), end: z.number(), text: z.string() }))
    .default([]),
});

export function normalizeLocalAsrResponse(raw: unknown): EngineResult {
  const parsed = VerboseJsonSchema.parse(raw);
  const segments: TimedText[] = parsed.segments.map((s) => ({
    startMs: Math.round(s.start * 1000),
    endMs: Math.round(s.end * 1000),
    text: s.text.trim(),
  }));
  return { language: parsed.language, segments };
}

/** Talks to the local Python ASR service. It reports no incremental progress. */
export class LocalAsrEngine implements RecognitionEngine {
  readonly kind = "local-asr" as const;
  readonly model: string;
  readonly reportsProgress = false;

  constructor(private readonly opts: LocalAsrOptions) {
    this.model = opts.model;
  }

  async init(): Promise<void> {
    const healthCheck = await fetch(`${this.opts.baseUrl}/healthz`, {
      dispatcher: this.opts.dispatcher,
      signal: AbortSignal.timeout(5000),
    });
    if (!healthCheck.ok) {
      throw new Error(`Local ASR service health check failed: ${healthCheck.status}`);
    }
  }

  async transcribe(audio: AudioHandle, language: string | undefined, options: EngineRunOptions): Promise<EngineResult> {
    options.onProgress?.(null);

    const form = new FormData();
    const fileName = path.basename(audio.path);
    const audioBuffer = await fs.promises.readFile(audio.path);
    form.append("file", new Blob([audioBuffer], { type: "audio/wav" }), fileName);
    form.append("model", this.opts.model);
    form.append("task", "transcribe");
    if (language) {
      form.append("language", language);
    }
    form.append("response_format", "verbose_json");

    const linked = linkSignals(AbortSignal.timeout(this.opts.timeoutMs), options.signal);
    let result: EngineResult;
    try {
      const response = await fetch(`${this.opts.baseUrl}/openai/v1/audio/transcriptions`, {
        method: "POST",
        body: form,
        dispatcher: this.opts.dispatcher,
        signal: linked.signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Local ASR transcription failed: ${response.status} ${errorText}`);
      }
      result = normalizeLocalAsrResponse(await response.json());
    } finally {
      linked.dispose();
    }
    options.onProgress?.(1);
    return result;
  }
}
