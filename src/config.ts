import "dotenv/config";
import path from "node:path";
import fs from "node:fs";
import ffmpegInstaller from "@ffmpeg-installer/ffmpeg";
import { z } from "zod";
import {
  DEFAULT_STAGE_WEIGHTS,
  DEFAULT_TRANSLATE_ENDPOINTS,
  DEFAULT_WHISPER_MODEL,
  isPipelineStage,
} from "./constants.js";
import type { PipelineStage } from "./types.js";

export type AsrEngineKind = "whisper-cpp" | "local-asr";

export interface EndpointConfig {
  url: string;
  apiKey?: string;
}

export interface TranslationPolicy {
  endpoints: EndpointConfig[];
  batchMaxChars: number;
  batchMaxSegments: number;
  attemptsPerEndpoint: number;
  retryDelayMs: number;
  unreachableAfter: number; // consecutive failures
  requestTimeoutMs: number;
  maxInFlightPerEndpoint: number;
  stageTimeoutMs: number;
}

export interface ServiceConfig {
  port: number;
  host: string;
  apiKey?: string;
  logLevel: string;
  workDir: string;
  ffmpegCmd: string;
  ffmpegExtraArgs: string[];
  asrEngine: AsrEngineKind;
  // whisper.cpp
  whisperCmd: string;
  whisperModel: string;
  whisperThreads?: number;
  modelsDir: string;
  // Local ASR service configuration
  localAsrBaseUrl: string; // e.g., http://localhost:5689
  localAsrModel: string;
  localTimeoutMs: number;
  translation: TranslationPolicy;
  stageWeights: Record<PipelineStage, number>;
}

type Env = Record<string, string | undefined>;

const EndpointListSchema = z
  .array(
    z.object({
      url: z.string().url(),
      apiKey: z.string().min(1).optional(),
    })
  )
  .min(1);

function ensureDir(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function intFrom(value: string | undefined, fallback: number, min = 0): number {
  const parsed = parseInt(value || "", 10);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.max(min, parsed);
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

export function parseEndpoints(env: Env): EndpointConfig[] {
  if (env.TRANSLATE_ENDPOINTS_JSON) {
    const parsed = EndpointListSchema.safeParse(JSON.parse(env.TRANSLATE_ENDPOINTS_JSON));
    if (!parsed.success) {
      throw new Error(`Invalid TRANSLATE_ENDPOINTS_JSON: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }
    return parsed.data.map((e) => ({ url: stripTrailingSlash(e.url), apiKey: e.apiKey }));
  }
  const urls = env.TRANSLATE_ENDPOINTS
    ? env.TRANSLATE_ENDPOINTS.split(",").map((u) => u.trim()).filter(Boolean)
    : [...DEFAULT_TRANSLATE_ENDPOINTS];
  const apiKey = env.TRANSLATE_API_KEY || undefined;
  return urls.map((url) => ({ url: stripTrailingSlash(url), apiKey }));
}

// "extract=5,transcribe=70,..."; unknown stages are ignored, missing ones keep defaults
export function parseStageWeights(raw: string | undefined): Record<PipelineStage, number> {
  const weights = { ...DEFAULT_STAGE_WEIGHTS };
  if (!raw) return weights;
  for (const pair of raw.split(",")) {
    const [key, value] = pair.split("=").map((p) => p.trim());
    const weight = Number(value);
    if (key && isPipelineStage(key) && Number.isFinite(weight) && weight >= 0) {
      weights[key] = weight;
    }
  }
  return weights;
}

export const rootDir = path.resolve(process.cwd());

export function loadConfig(env: Env = process.env): ServiceConfig {
  const workDir = env.WORK_DIR ? path.resolve(env.WORK_DIR) : path.join(rootDir, "work");
  const ffmpegCmd = env.FFMPEG_CMD || ffmpegInstaller.path || "ffmpeg";
  const asrEngine: AsrEngineKind = env.ASR_ENGINE === "whisper-cpp" ? "whisper-cpp" : "local-asr";

  const translation: TranslationPolicy = {
    endpoints: parseEndpoints(env),
    batchMaxChars: intFrom(env.TRANSLATE_BATCH_MAX_CHARS, 1800, 1),
    batchMaxSegments: intFrom(env.TRANSLATE_BATCH_MAX_SEGMENTS, 25, 1),
    attemptsPerEndpoint: intFrom(env.TRANSLATE_ATTEMPTS_PER_ENDPOINT, 2, 1),
    retryDelayMs: intFrom(env.TRANSLATE_RETRY_DELAY_MS, 500),
    unreachableAfter: intFrom(env.TRANSLATE_UNREACHABLE_AFTER, 3, 1),
    requestTimeoutMs: intFrom(env.TRANSLATE_REQUEST_TIMEOUT_MS, 10000, 100),
    maxInFlightPerEndpoint: intFrom(env.TRANSLATE_MAX_IN_FLIGHT_PER_ENDPOINT, 2, 1),
    stageTimeoutMs: intFrom(env.TRANSLATE_STAGE_TIMEOUT_MS, 300000, 1000),
  };

  // Only the work directory is created eagerly
  ensureDir(workDir);

  return {
    port: intFrom(env.PORT, 5688),
    host: env.HOST || "0.0.0.0",
    apiKey: env.API_KEY || undefined,
    logLevel: env.LOG_LEVEL || "info",
    workDir,
    ffmpegCmd,
    ffmpegExtraArgs: (env.FFMPEG_EXTRA_ARGS || "").split(/\s+/).filter(Boolean),
    asrEngine,
    whisperCmd: env.WHISPER_CMD || "whisper-cli",
    whisperModel: env.WHISPER_MODEL || "ggml-base.bin",
    whisperThreads: env.WHISPER_THREADS ? intFrom(env.WHISPER_THREADS, 4, 1) : undefined,
    modelsDir: env.MODELS_DIR ? path.resolve(env.MODELS_DIR) : path.join(rootDir, "models"),
    localAsrBaseUrl: stripTrailingSlash(env.LOCAL_ASR_BASE_URL || "http://localhost:5689"),
    localAsrModel: env.LOCAL_ASR_MODEL || DEFAULT_WHISPER_MODEL,
    // Default 2 hours for full file processing
    localTimeoutMs: intFrom(env.LOCAL_TIMEOUT_MS, 7200000, 60000),
    translation,
    stageWeights: parseStageWeights(env.STAGE_WEIGHTS),
  };
}
