import { EventEmitter } from "node:events";
import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { AUTO_LANGUAGE } from "../constants.js";
import {
  CancelledError,
  EmbeddingError,
  ExportError,
  ExtractionError,
  InvalidStateError,
  JobConflictError,
  PipelineError,
  TranscriptionError,
  TranslationError,
  errorMessage,
  isCancellation,
} from "../errors.js";
import type { Logger } from "../logger.js";
import type { TranscriptionAdapter } from "../pipeline/engine.js";
import type { EmbeddingService } from "../pipeline/embed.js";
import type { MediaExtractor } from "../pipeline/extract.js";
import { SegmentStore } from "../store/segmentStore.js";
import { exportSubtitles, parseSubtitles, type ExportOptions } from "../subtitles/format.js";
import { subtitleStats, type SubtitleStats } from "../subtitles/stats.js";
import { formatDuration } from "../subtitles/timecode.js";
import type { TranslationCoordinator } from "../translate/coordinator.js";
import type {
  JobArtifacts,
  JobError,
  JobRequest,
  JobSnapshot,
  JobState,
  OutputOptions,
  PipelineStage,
  ProgressEvent,
  Segment,
  TranslationSummary,
} from "../types.js";
import { ProgressModel } from "./progress.js";

export interface StateChange {
  jobId: string;
  from: JobState;
  to: JobState;
}

export type JobEvents = {
  progress: [ProgressEvent];
  state: [StateChange];
  segments: [number]; // store revision
};

export interface JobControllerDeps {
  extractor: MediaExtractor;
  transcriber: TranscriptionAdapter;
  translator: TranslationCoordinator;
  embedder: EmbeddingService;
  workDir: string;
  stageWeights: Record<PipelineStage, number>;
  log: Logger;
  store?: SegmentStore;
  now?: () => number;
  newId?: () => string;
}

interface Job {
  id: string;
  request: JobRequest;
  state: JobState;
  startedAt: number;
  updatedAt: number;
  abort: AbortController;
  cancelRequested: boolean;
  progress: ProgressEvent | null;
  progressModel: ProgressModel;
  error: JobError | null;
  detectedLanguage?: string;
  translation?: TranslationSummary;
  artifacts?: JobArtifacts;
  workDir: string;
  log: Logger;
}

const TERMINAL: ReadonlySet<JobState> = new Set(["completed", "cancelled", "failed"]);

const FORWARD: Record<JobState, readonly JobState[]> = {
  idle: ["extracting"],
  extracting: ["transcribing"],
  transcribing: ["translating", "awaiting_edit"],
  translating: ["awaiting_edit"],
  awaiting_edit: ["exporting", "embedding"],
  exporting: ["embedding", "completed"],
  embedding: ["completed"],
  completed: ["awaiting_edit"],
  cancelled: [],
  failed: [],
};

const STAGE_OF: Partial<Record<JobState, PipelineStage>> = {
  extracting: "extract",
  transcribing: "transcribe",
  translating: "translate",
  exporting: "finalize",
  embedding: "finalize",
};

export function canTransition(from: JobState, to: JobState): boolean {
  if (to === "cancelled" || to === "failed") return !TERMINAL.has(from) && from !== "idle";
  return FORWARD[from].includes(to);
}

/**
 * Drives one job at a time through extraction, transcription, optional translation and
 * the edit/finalize loop. Progress, state and segment changes go out as events.
 */
export class JobController extends EventEmitter<JobEvents> {
  readonly store: SegmentStore;
  private job: Job | null = null;
  private pipeline: Promise<void> = Promise.resolve();
  private readonly now: () => number;
  private readonly newId: () => string;

  constructor(private readonly deps: JobControllerDeps) {
    super();
    this.store = deps.store ?? new SegmentStore();
    this.now = deps.now ?? Date.now;
    this.newId = deps.newId ?? (() => crypto.randomUUID());
  }

  get active(): boolean {
    return this.job !== null && !TERMINAL.has(this.job.state);
  }

  start(request: JobRequest): JobSnapshot {
    if (this.job && this.active) {
      throw new JobConflictError(this.job.id);
    }
    if (this.job) this.removeWorkDir(this.job);

    this.store.clear();
    const id = this.newId();
    const startedAt = this.now();
    const stages: PipelineStage[] = request.targetLanguage
      ? ["extract", "transcribe", "translate", "finalize"]
      : ["extract", "transcribe", "finalize"];
    const job: Job = {
      id,
      request,
      state: "idle",
      startedAt,
      updatedAt: startedAt,
      abort: new AbortController(),
      cancelRequested: false,
      progress: null,
      progressModel: new ProgressModel(stages, this.deps.stageWeights, startedAt, this.now),
      error: null,
      workDir: path.join(this.deps.workDir, `job_${id}`),
      log: this.deps.log.child({ jobId: id }),
    };
    this.job = job;
    job.log.info({ sourcePath: request.sourcePath, sourceLanguage: request.sourceLanguage, targetLanguage: request.targetLanguage }, "job started");
    this.pipeline = this.run(job);
    return this.toSnapshot(job);
  }

  /** Sets the cancellation flag; a job resting in awaiting_edit is discarded at once. */
  cancel(): JobSnapshot {
    const job = this.requireJob();
    if (TERMINAL.has(job.state)) {
      throw new InvalidStateError(`Job ${job.id} is already ${job.state}`);
    }
    job.cancelRequested = true;
    job.abort.abort(new CancelledError());
    if (job.state === "awaiting_edit") {
      this.settleCancelled(job);
    }
    return this.toSnapshot(job);
  }

  /** Resolves once the background pipeline of the current job has settled. */
  async settled(): Promise<void> {
    await this.pipeline;
  }

  snapshot(): JobSnapshot | null {
    return this.job ? this.toSnapshot(this.job) : null;
  }

  segments(): readonly Segment[] {
    return this.store.asOrderedSequence();
  }

  editText(index: number, text: string): Segment {
    const job = this.requireEditable();
    const segment = this.store.editText(index, text);
    this.afterEdit(job);
    return segment;
  }

  editTranslation(index: number, translation: string): Segment {
    const job = this.requireEditable();
    const segment = this.store.editTranslation(index, translation);
    this.afterEdit(job);
    return segment;
  }

  /**
   * Replaces every segment with the cues of an srt or vtt document. Translations and the
   * translation summary are dropped along with the old segments.
   */
  importSubtitles(content: string): readonly Segment[] {
    const job = this.requireEditable();
    const cues = parseSubtitles(content);
    if (cues.length === 0) {
      throw new ExportError("No subtitle cues found in the imported document");
    }
    this.store.replaceAll(cues.map(({ startMs, endMs, text }) => ({ startMs, endMs, text })));
    job.translation = undefined;
    this.afterEdit(job);
    job.log.info({ segments: this.store.size }, "subtitles imported");
    return this.store.asOrderedSequence();
  }

  render(format: string, options?: ExportOptions): string {
    this.requireJob();
    return exportSubtitles(this.store.asOrderedSequence(), format, options);
  }

  stats(): SubtitleStats {
    this.requireJob();
    return subtitleStats(this.store.asOrderedSequence());
  }

  /** Exports and/or embeds the current segments, then completes the job. */
  async finalize(overrides: Partial<OutputOptions> = {}): Promise<JobArtifacts> {
    const job = this.requireJob();
    if (job.state === "completed") this.transition(job, "awaiting_edit");
    if (job.state !== "awaiting_edit") {
      throw new InvalidStateError(`Cannot finalize job in state ${job.state}`);
    }
    const base = job.request.output;
    const output: OutputOptions = {
      mode: overrides.mode ?? base.mode,
      formats: overrides.formats ?? base.formats,
      embedMode: overrides.embedMode ?? base.embedMode,
      outputDir: overrides.outputDir ?? base.outputDir,
    };
    const task = this.runFinalize(job, output);
    this.pipeline = task.then(
      () => undefined,
      () => undefined
    );
    return await task;
  }

  private async run(job: Job): Promise<void> {
    const { signal } = job.abort;
    try {
      this.transition(job, "extracting");
      this.report(job, "extract", 0, "Extracting audio");
      const audio = await this.interruptible(
        job,
        this.deps.extractor.extract(job.request.sourcePath, {
          workDir: job.workDir,
          signal,
          onProgress: (f) => this.report(job, "extract", f, "Extracting audio"),
        })
      );
      this.checkpoint(job);

      this.transition(job, "transcribing");
      this.report(job, "transcribe", this.deps.transcriber.reportsProgress ? 0 : null, "Transcribing audio");
      const result = await this.interruptible(
        job,
        this.deps.transcriber.transcribe(audio, job.request.sourceLanguage, {
          signal,
          onProgress: (f) => this.report(job, "transcribe", f, "Transcribing audio"),
        })
      );
      fs.rmSync(audio.path, { force: true });
      this.checkpoint(job);

      job.detectedLanguage = result.language;
      this.store.replaceAll(result.segments);
      this.emit("segments", this.store.revision);
      job.log.info({ segments: this.store.size, language: result.language }, "transcription loaded");

      const target = job.request.targetLanguage;
      if (target) {
        this.transition(job, "translating");
        this.report(job, "translate", 0, `Translating to ${target}`);
        try {
          job.translation = await this.deps.translator.translate(this.store, {
            sourceLanguage: this.translationSource(job),
            targetLanguage: target,
            signal,
            onProgress: (f) => this.report(job, "translate", f, `Translating to ${target}`),
          });
        } finally {
          this.emit("segments", this.store.revision);
        }
        this.checkpoint(job);
      }

      this.transition(job, "awaiting_edit");
      this.report(job, "finalize", 0, "Ready for review");
      job.log.info({ elapsed: formatDuration(this.now() - job.startedAt) }, "job awaiting edit");
    } catch (err) {
      this.settleError(job, err);
    }
  }

  private async runFinalize(job: Job, output: OutputOptions): Promise<JobArtifacts> {
    const { signal } = job.abort;
    const segments = this.store.asOrderedSequence();
    const sourcePath = job.request.sourcePath;
    const outputDir = output.outputDir ?? path.dirname(sourcePath);
    const base = path.basename(sourcePath, path.extname(sourcePath));
    const suffix = this.languageSuffix(job);
    const artifacts: JobArtifacts = { subtitlePaths: {} };
    job.progressModel.restartAt("finalize", this.now());

    try {
      if (output.mode === "file" || output.mode === "both") {
        this.transition(job, "exporting");
        fs.mkdirSync(outputDir, { recursive: true });
        output.formats.forEach((format, i) => {
          const blob = exportSubtitles(segments, format);
          const filePath = path.join(outputDir, `${base}${suffix}.${format}`);
          fs.writeFileSync(filePath, blob, "utf-8");
          artifacts.subtitlePaths[format] = filePath;
          this.report(job, "finalize", (i + 1) / output.formats.length / 2, `Wrote ${path.basename(filePath)}`);
        });
        this.checkpoint(job);
      }

      if (output.mode === "embed" || output.mode === "both") {
        this.transition(job, "embedding");
        this.report(job, "finalize", 0.5, `Embedding ${output.embedMode} subtitles`);
        const outputPath = path.join(outputDir, `${base}${suffix}_subtitled${path.extname(sourcePath)}`);
        artifacts.videoPath = await this.deps.embedder.embed(sourcePath, exportSubtitles(segments, "srt"), output.embedMode, {
          outputPath,
          workDir: job.workDir,
          signal,
          onProgress: (f) => this.report(job, "finalize", 0.5 + (f ?? 0) / 2, `Embedding ${output.embedMode} subtitles`),
        });
        this.checkpoint(job);
      }

      job.artifacts = artifacts;
      this.report(job, "finalize", 1, "Completed");
      this.transition(job, "completed");
      this.removeWorkDir(job);
      job.log.info({ artifacts }, "job completed");
      return artifacts;
    } catch (err) {
      this.settleError(job, err);
      throw err;
    }
  }

  // Rejects as soon as the job is cancelled, even if the engine keeps running
  private async interruptible<T>(job: Job, work: Promise<T>): Promise<T> {
    const { signal } = job.abort;
    if (signal.aborted) {
      work.catch((err: unknown) => job.log.debug({ err }, "stage settled after cancel"));
      throw new CancelledError();
    }
    let onAbort: (() => void) | undefined;
    const cancelled = new Promise<never>((_, reject) => {
      onAbort = () => reject(new CancelledError());
      signal.addEventListener("abort", onAbort, { once: true });
    });
    try {
      return await Promise.race([work, cancelled]);
    } finally {
      if (onAbort) signal.removeEventListener("abort", onAbort);
      if (signal.aborted) {
        work.catch((err: unknown) => job.log.debug({ err }, "stage settled after cancel"));
      }
    }
  }

  private checkpoint(job: Job): void {
    if (job.cancelRequested) throw new CancelledError();
  }

  private transition(job: Job, to: JobState): void {
    const from = job.state;
    if (!canTransition(from, to)) {
      throw new InvalidStateError(`Illegal transition ${from} -> ${to}`);
    }
    job.state = to;
    job.updatedAt = this.now();
    job.log.info({ from, to }, "job state changed");
    this.emit("state", { jobId: job.id, from, to });
  }

  private report(job: Job, stage: PipelineStage, stageFraction: number | null, message: string): void {
    if (job !== this.job || TERMINAL.has(job.state)) return;
    job.progress = job.progressModel.event(job.id, stage, stageFraction, message);
    job.updatedAt = this.now();
    this.emit("progress", job.progress);
  }

  private settleError(job: Job, err: unknown): void {
    if (TERMINAL.has(job.state)) return;
    if (job.cancelRequested || isCancellation(err, job.abort.signal)) {
      this.settleCancelled(job);
      return;
    }
    const stage = STAGE_OF[job.state];
    const cause = err instanceof PipelineError ? err : wrapForState(job.state, err);
    job.error = { code: cause.code, message: cause.message, stage: cause.stage ?? stage };
    job.log.error({ err, stage: job.error.stage }, "job failed");
    this.transition(job, "failed");
    this.removeWorkDir(job);
  }

  private settleCancelled(job: Job): void {
    // a translation pass may have been cut short; unfinished lines stay flagged
    this.transition(job, "cancelled");
    this.removeWorkDir(job);
    job.log.info({ segments: this.store.size }, "job cancelled");
  }

  private afterEdit(job: Job): void {
    if (job.state === "completed") this.transition(job, "awaiting_edit");
    job.updatedAt = this.now();
    this.emit("segments", this.store.revision);
  }

  private requireJob(): Job {
    if (!this.job) throw new InvalidStateError("No job has been started");
    return this.job;
  }

  private requireEditable(): Job {
    const job = this.requireJob();
    if (job.state !== "awaiting_edit" && job.state !== "completed") {
      throw new InvalidStateError(`Segments cannot be edited while the job is ${job.state}`);
    }
    return job;
  }

  private translationSource(job: Job): string {
    const requested = job.request.sourceLanguage;
    if (requested !== AUTO_LANGUAGE) return requested;
    return job.detectedLanguage ?? AUTO_LANGUAGE;
  }

  private languageSuffix(job: Job): string {
    const lang = job.translation ? job.request.targetLanguage : job.request.sourceLanguage;
    return lang && lang !== AUTO_LANGUAGE ? `_${lang}` : "";
  }

  private removeWorkDir(job: Job): void {
    try {
      fs.rmSync(job.workDir, { recursive: true, force: true });
    } catch (err) {
      job.log.warn({ err, workDir: job.workDir }, "work dir cleanup failed");
    }
  }

  private toSnapshot(job: Job): JobSnapshot {
    return {
      id: job.id,
      state: job.state,
      request: job.request,
      startedAt: job.startedAt,
      updatedAt: job.updatedAt,
      cancelRequested: job.cancelRequested,
      progress: job.progress,
      error: job.error,
      detectedLanguage: job.detectedLanguage,
      translation: job.translation,
      artifacts: job.artifacts,
      segmentCount: this.store.size,
    };
  }
}

function wrapForState(state: JobState, err: unknown): PipelineError {
  const message = errorMessage(err);
  switch (state) {
    case "extracting":
      return new ExtractionError(message, err);
    case "transcribing":
      return new TranscriptionError(message, err);
    case "translating":
      return new TranslationError(message, err);
    case "exporting":
      return new ExportError(message, err);
    case "embedding":
      return new EmbeddingError(message, err);
    default:
      return new PipelineError("INVALID_STATE", message, { cause: err });
  }
}
