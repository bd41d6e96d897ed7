export type OutputMode = "file" | "embed" | "both";
export type EmbedMode = "soft" | "hard";
export type SubtitleFormat = "srt" | "vtt";

export interface OutputOptions {
  mode: OutputMode;
  formats: SubtitleFormat[];
  embedMode: EmbedMode;
  outputDir?: string;
}

export interface JobRequest {
  sourcePath: string;
  sourceLanguage: string; // language code or "auto"
  targetLanguage?: string;
  output: OutputOptions;
}

export type JobState =
  | "idle"
  | "extracting"
  | "transcribing"
  | "translating"
  | "awaiting_edit"
  | "exporting"
  | "embedding"
  | "completed"
  | "cancelled"
  | "failed";

export type PipelineStage = "extract" | "transcribe" | "translate" | "finalize";

export type TranslationStatus = "none" | "translated" | "untranslated";

export interface Segment {
  index: number;
  startMs: number;
  endMs: number;
  text: string;
  translation?: string;
  translationStatus: TranslationStatus;
}

// What the recognition engine hands back, before it becomes a Segment
export interface TimedText {
  startMs: number;
  endMs: number;
  text: string;
}

export interface ProgressEvent {
  jobId: string;
  stage: PipelineStage;
  stageFraction: number | null; // null = indeterminate
  fraction: number;
  estimatedRemainingMs: number | null;
  message: string;
}

export interface JobError {
  code: string;
  message: string;
  stage?: PipelineStage;
}

export interface JobArtifacts {
  subtitlePaths: Partial<Record<SubtitleFormat, string>>;
  videoPath?: string;
}

export interface TranslationSummary {
  targetLanguage: string;
  batches: number;
  translatedBatches: number;
  failedBatches: number;
  untranslatedSegments: number[];
  abandoned: boolean;
}

export interface JobSnapshot {
  id: string;
  state: JobState;
  request: JobRequest;
  startedAt: number;
  updatedAt: number;
  cancelRequested: boolean;
  progress: ProgressEvent | null;
  error: JobError | null;
  detectedLanguage?: string;
  translation?: TranslationSummary;
  artifacts?: JobArtifacts;
  segmentCount: number;
}
