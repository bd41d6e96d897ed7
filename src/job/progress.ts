import { MIN_ESTIMATE_FRACTION } from "../constants.js";
import type { PipelineStage, ProgressEvent } from "../types.js";

/**
 * Linear estimate: remaining = elapsed / done * (1 - done). `done` is floored at
 * MIN_ESTIMATE_FRACTION so the first moments of a run do not divide by zero.
 */
export function estimateRemainingMs(elapsedMs: number, fraction: number): number {
  if (fraction >= 1) return 0;
  const done = Math.max(fraction, MIN_ESTIMATE_FRACTION);
  return Math.round((elapsedMs / done) * (1 - done));
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/** Maps per-stage fractions onto one job-wide fraction using the stage weights. */
export class ProgressModel {
  private readonly offsets = new Map<PipelineStage, number>();
  private readonly shares = new Map<PipelineStage, number>();
  // where the remaining-time estimate starts measuring from
  private origin: { at: number; fraction: number };

  constructor(
    stages: readonly PipelineStage[],
    weights: Record<PipelineStage, number>,
    startedAt: number,
    private readonly now: () => number = Date.now
  ) {
    this.origin = { at: startedAt, fraction: 0 };
    const total = stages.reduce((sum, stage) => sum + weights[stage], 0) || 1;
    let offset = 0;
    for (const stage of stages) {
      const share = weights[stage] / total;
      this.offsets.set(stage, offset);
      this.shares.set(stage, share);
      offset += share;
    }
  }

  /** Overall fraction; an indeterminate stage (null) counts as just started. */
  overall(stage: PipelineStage, stageFraction: number | null): number {
    const offset = this.offsets.get(stage) ?? 0;
    const share = this.shares.get(stage) ?? 0;
    return clamp01(offset + share * clamp01(stageFraction ?? 0));
  }

  /** Restarts the estimate clock at `at`, counting only the work from `stage` onwards. */
  restartAt(stage: PipelineStage, at: number): void {
    this.origin = { at, fraction: this.offsets.get(stage) ?? 0 };
  }

  event(jobId: string, stage: PipelineStage, stageFraction: number | null, message: string): ProgressEvent {
    const fraction = this.overall(stage, stageFraction);
    return {
      jobId,
      stage,
      stageFraction: stageFraction === null ? null : clamp01(stageFraction),
      fraction,
      estimatedRemainingMs: this.estimate(fraction),
      message,
    };
  }

  private estimate(fraction: number): number {
    const { at, fraction: base } = this.origin;
    const done = base >= 1 ? 1 : Math.max(0, (fraction - base) / (1 - base));
    return estimateRemainingMs(this.now() - at, done);
  }
}
