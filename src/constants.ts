/**
 * Centralized pipeline defaults
 * Values here are overridable through config.ts unless noted otherwise
 */

import type { PipelineStage } from "./types.js";

// Sentinel passed as source language when the engine should detect it
export const AUTO_LANGUAGE = "auto";

// Default model for the local ASR service
export const DEFAULT_WHISPER_MODEL = "distil-large-v3";

// Public LibreTranslate mirrors, tried in this order
export const DEFAULT_TRANSLATE_ENDPOINTS = [
  "https://translate.argosopentech.com",
  "https://libretranslate.de",
  "https://translate.terraprint.co",
  "https://lt.vern.cc",
] as const;

// Expected share of total wall-clock per stage (percent)
export const DEFAULT_STAGE_WEIGHTS: Record<PipelineStage, number> = {
  extract: 5,
  transcribe: 70,
  translate: 20,
  finalize: 5,
};

export const PIPELINE_STAGES = ["extract", "transcribe", "translate", "finalize"] as const;

export function isPipelineStage(value: string): value is PipelineStage {
  return (PIPELINE_STAGES as readonly string[]).includes(value);
}

// Below this completed fraction the remaining-time estimate is held at the floor value
export const MIN_ESTIMATE_FRACTION = 0.01;

// Extracted audio layout expected by whisper models
export const AUDIO_SAMPLE_RATE = 16000;
export const AUDIO_CHANNELS = 1;

export const SUBTITLE_FORMATS = ["srt", "vtt"] as const;

// Containers that can carry a mov_text stream; everything else gets srt muxed in
export const MOV_TEXT_CONTAINERS = [".mp4", ".m4v", ".mov"] as const;

export const COMMAND_ERROR_EXCERPT_LINES = 40;
