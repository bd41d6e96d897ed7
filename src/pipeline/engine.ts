import fs from "node:fs";
import { z } from "zod";
import type { Logger } from "../logger.js";
import type { AsrEngineKind, ServiceConfig } from "../config.js";
import { AUTO_LANGUAGE } from "../constants.js";
import { CancelledError, TranscriptionError, errorMessage } from "../errors.js";
import type { TimedText } from "../types.js";
import type { AudioHandle } from "./extract.js";
import { LocalAsrEngine } from "./transcribe_local.js";
import { WhisperCppEngine } from "./transcribe.js";

export interface EngineRunOptions {
  signal?: AbortSignal;
  onProgress?: (fraction: number | null) => void;
}

export interface EngineResult {
  language?: string;
  segments: TimedText[];
}

/** A speech-recognition backend. `init` must fail when weights or the service are missing. */
export interface RecognitionEngine {
  readonly kind: AsrEngineKind | "custom";
  readonly model: string;
  readonly reportsProgress: boolean;
  init(): Promise<void>;
  transcribe(audio: AudioHandle, language: string | undefined, options: EngineRunOptions): Promise<EngineResult>;
}

export interface EngineHandle {
  readonly engine: RecognitionEngine;
  readonly languages: ReadonlySet<string>;
  /** Resolves once the engine is initialized; memoized for the handle's lifetime. */
  ready(): Promise<void>;
}

const LanguageTableSchema = z.record(z.string());

let languageTable: ReadonlySet<string> | undefined;

export function loadLanguageCodes(): ReadonlySet<string> {
  if (!languageTable) {
    const raw = fs.readFileSync(new URL("../../data/whisper-languages.json", import.meta.url), "utf-8");
    languageTable = new Set(Object.keys(LanguageTableSchema.parse(JSON.parse(raw))));
  }
  return languageTable;
}

export function wrapEngine(engine: RecognitionEngine, languages: ReadonlySet<string> = loadLanguageCodes()): EngineHandle {
  let initialized: Promise<void> | undefined;
  return {
    engine,
    languages,
    ready() {
      if (!initialized) {
        initialized = engine.init().catch((err: unknown) => {
          initialized = undefined;
          throw new TranscriptionError(`Engine initialization failed (${engine.kind}/${engine.model}): ${errorMessage(err)}`, err);
        });
      }
      return initialized;
    },
  };
}

/** Created once at process start and injected into the transcription adapter. */
export function createEngineHandle(cfg: ServiceConfig, log: Logger): EngineHandle {
  const engine: RecognitionEngine =
    cfg.asrEngine === "whisper-cpp"
      ? new WhisperCppEngine({
          command: cfg.whisperCmd,
          model: cfg.whisperModel,
          modelsDir: cfg.modelsDir,
          threads: cfg.whisperThreads,
        })
      : new LocalAsrEngine({ baseUrl: cfg.localAsrBaseUrl, model: cfg.localAsrModel, timeoutMs: cfg.localTimeoutMs });
  log.info({ engine: engine.kind, model: engine.model }, "speech engine configured");
  return wrapEngine(engine);
}

export class TranscriptionAdapter {
  constructor(private readonly handle: EngineHandle) {}

  get reportsProgress(): boolean {
    return this.handle.engine.reportsProgress;
  }

  async transcribe(audio: AudioHandle, sourceLanguage: string, options: EngineRunOptions = {}): Promise<EngineResult> {
    const language = sourceLanguage.trim().toLowerCase();
    if (language !== AUTO_LANGUAGE && !this.handle.languages.has(language)) {
      throw new TranscriptionError(`Unsupported language code: ${sourceLanguage}`);
    }

    await this.handle.ready();
    if (options.signal?.aborted) throw new CancelledError();

    try {
      const result = await this.handle.engine.transcribe(
        audio,
        language === AUTO_LANGUAGE ? undefined : language,
        options
      );
      return {
        language: result.language,
        segments: result.segments.map((s) => ({ startMs: s.startMs, endMs: s.endMs, text: s.text.trim() })),
      };
    } catch (err) {
      if (options.signal?.aborted) throw new CancelledError();
      if (err instanceof TranscriptionError) throw err;
      throw new TranscriptionError(`Transcription failed: ${errorMessage(err)}`, err);
    }
  }
}
