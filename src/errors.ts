import type { PipelineStage } from "./types.js";

export type ErrorCode =
  | "EXTRACTION"
  | "TRANSCRIPTION"
  | "TRANSLATION"
  | "EXPORT"
  | "EMBEDDING"
  | "CANCELLED"
  | "INDEX"
  | "JOB_CONFLICT"
  | "INVALID_STATE";

export class PipelineError extends Error {
  readonly code: ErrorCode;
  stage?: PipelineStage;

  constructor(code: ErrorCode, message: string, options?: { stage?: PipelineStage; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "PipelineError";
    this.code = code;
    this.stage = options?.stage;
  }
}

export class ExtractionError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super("EXTRACTION", message, { stage: "extract", cause });
    this.name = "ExtractionError";
  }
}

export class TranscriptionError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super("TRANSCRIPTION", message, { stage: "transcribe", cause });
    this.name = "TranscriptionError";
  }
}

/** Raised only when no batch of a translation pass could be translated. */
export class TranslationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super("TRANSLATION", message, { stage: "translate", cause });
    this.name = "TranslationError";
  }
}

export class ExportError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super("EXPORT", message, { stage: "finalize", cause });
    this.name = "ExportError";
  }
}

export class EmbeddingError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super("EMBEDDING", message, { stage: "finalize", cause });
    this.name = "EmbeddingError";
  }
}

export class CancelledError extends PipelineError {
  constructor(message = "Job cancelled") {
    super("CANCELLED", message);
    this.name = "CancelledError";
  }
}

export class IndexError extends PipelineError {
  constructor(index: number, size: number) {
    super("INDEX", `Segment index ${index} out of range (0..${size - 1})`);
    this.name = "IndexError";
  }
}

export class JobConflictError extends PipelineError {
  constructor(activeJobId: string) {
    super("JOB_CONFLICT", `Job ${activeJobId} is still active`);
    this.name = "JobConflictError";
  }
}

export class InvalidStateError extends PipelineError {
  constructor(message: string) {
    super("INVALID_STATE", message);
    this.name = "InvalidStateError";
  }
}

export function isCancellation(err: unknown, signal?: AbortSignal): boolean {
  if (err instanceof CancelledError) return true;
  if (signal?.aborted) return true;
  return err instanceof Error && err.name === "AbortError";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
