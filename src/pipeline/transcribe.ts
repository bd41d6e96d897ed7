import path from "node:path";
import fs from "node:fs";
import { z } from "zod";
import { runCommand } from "../utils/process.js";
import type { TimedText } from "../types.js";
import type { AudioHandle } from "./extract.js";
import type { EngineResult, EngineRunOptions, RecognitionEngine } from "./engine.js";

export interface WhisperCppOptions {
  command: string; // whisper-cli binary
  model: string; // e.g., ggml-base.bin, absolute or relative to modelsDir
  modelsDir: string;
  threads?: number;
}

// whisper.cpp -oj writes offsets in milliseconds under "transcription"
const WhisperCppJsonSchema = z.object({
  result: z.object({ language: z.string().optional() }).optional(),
  transcription: z.array(
    z.object({
      offsets: z.object({ from: z.number(), to: z.number() }),
      text: z.string(),
    })
  ),
});

const PROGRESS_RE = /progress\s*=\s*(\d+)%/;

export function normalizeWhisperCppJson(raw: unknown): EngineResult {
  const parsed = WhisperCppJsonSchema.parse(raw);
  const segments: TimedText[] = parsed.transcription.map((seg) => ({
    startMs: seg.offsets.from,
    endMs: seg.offsets.to,
    text: seg.text.trim(),
  }));
  return { language: parsed.result?.language, segments };
}

export class WhisperCppEngine implements RecognitionEngine {
  readonly kind = "whisper-cpp" as const;
  readonly model: string;
  readonly reportsProgress = true;
  private readonly modelPath: string;

  constructor(private readonly opts: WhisperCppOptions) {
    this.model = opts.model;
    this.modelPath = path.isAbsolute(opts.model) ? opts.model : path.join(opts.modelsDir, opts.model);
  }

  async init(): Promise<void> {
    if (!fs.existsSync(this.modelPath)) {
      throw new Error(`Model weights not found at ${this.modelPath}`);
    }
  }

  async transcribe(audio: AudioHandle, language: string | undefined, options: EngineRunOptions): Promise<EngineResult> {
    const outPrefix = path.join(path.dirname(audio.path), "whisper");

    // -pp prints "progress = N%" on stderr
    const args = ["-m", this.modelPath, "-f", audio.path, "-of", outPrefix, "-oj", "-pp", "-l", language ?? "auto"];
    if (this.opts.threads) {
      args.push("-t", String(this.opts.threads));
    }

    await runCommand(this.opts.command, args, {
      signal: options.signal,
      onStderrLine: (line) => {
        const match = PROGRESS_RE.exec(line);
        if (match) options.onProgress?.(Math.min(1, parseInt(match[1], 10) / 100));
      },
    });

    const jsonPath = `${outPrefix}.json`;
    if (!fs.existsSync(jsonPath)) {
      throw new Error(`Whisper output JSON not found at ${jsonPath}`);
    }
    return normalizeWhisperCppJson(JSON.parse(fs.readFileSync(jsonPath, "utf-8")));
  }
}
