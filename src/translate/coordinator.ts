import pLimit from "p-limit";
import type { TranslationPolicy } from "../config.js";
import { TranslationError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { SegmentStore } from "../store/segmentStore.js";
import type { Segment, TranslationSummary } from "../types.js";
import { sleep } from "../utils/signal.js";
import type { EndpointPool, EndpointState } from "./endpointPool.js";
import type { TranslationTransport } from "./libreTranslate.js";

export interface Batch {
  indices: number[];
  texts: string[];
  chars: number;
}

type BatchFailure = { status: "failed"; reason: "exhausted" | "abandoned" | "cancelled" };
type BatchOutcome = { status: "translated"; endpoint: string } | BatchFailure;

export interface TranslatePassOptions {
  sourceLanguage: string; // "auto" allowed
  targetLanguage: string;
  signal?: AbortSignal;
  onProgress?: (fraction: number) => void;
}

/**
 * Splits segments into request-sized batches, keeping store order. A single text over
 * the character budget still travels alone. Empty texts are not sent anywhere.
 */
export function partitionBatches(segments: readonly Segment[], maxChars: number, maxSegments: number): Batch[] {
  const batches: Batch[] = [];
  let current: Batch = { indices: [], texts: [], chars: 0 };
  for (const s of segments) {
    if (!s.text.trim()) continue;
    const fits = current.indices.length < maxSegments && current.chars + s.text.length <= maxChars;
    if (current.indices.length > 0 && !fits) {
      batches.push(current);
      current = { indices: [], texts: [], chars: 0 };
    }
    current.indices.push(s.index);
    current.texts.push(s.text);
    current.chars += s.text.length;
  }
  if (current.indices.length > 0) batches.push(current);
  return batches;
}

export class TranslationCoordinator {
  constructor(
    private readonly pool: EndpointPool,
    private readonly transport: TranslationTransport,
    private readonly policy: TranslationPolicy,
    private readonly log: Logger
  ) {}

  /**
   * Translates every segment of `store` in place. Batch failures are absorbed: their
   * segments keep the original text and are flagged untranslated. Throws TranslationError
   * only when not a single batch made it through.
   */
  async translate(store: SegmentStore, opts: TranslatePassOptions): Promise<TranslationSummary> {
    store.resetTranslations();
    const segments = store.asOrderedSequence();
    const empties = segments.filter((s) => !s.text.trim()).map((s) => s.index);
    store.applyTranslations(new Map(empties.map((i): [number, string] => [i, ""])));

    const batches = partitionBatches(segments, this.policy.batchMaxChars, this.policy.batchMaxSegments);
    const deadline = Date.now() + this.policy.stageTimeoutMs;
    const perEndpoint = new Map<number, ReturnType<typeof pLimit>>();
    const endpointLimit = (id: number) => {
      let limit = perEndpoint.get(id);
      if (!limit) {
        limit = pLimit(this.policy.maxInFlightPerEndpoint);
        perEndpoint.set(id, limit);
      }
      return limit;
    };
    const limit = pLimit(Math.max(1, this.policy.maxInFlightPerEndpoint * this.pool.size));

    let done = 0;
    const outcomes = await Promise.all(
      batches.map((batch, i) =>
        limit(async () => {
          // Each batch writes exactly its own indices, whatever order they finish in
          const outcome = await this.runBatch(store, batch, i, opts, deadline, endpointLimit);
          if (outcome.status === "translated") {
            this.log.debug({ batch: i, size: batch.indices.length, endpoint: outcome.endpoint }, "batch translated");
          } else {
            store.markUntranslated(batch.indices);
            if (outcome.reason !== "cancelled") {
              this.log.warn({ batch: i, size: batch.indices.length, reason: outcome.reason }, "batch left untranslated");
            }
          }
          done += 1;
          opts.onProgress?.(done / batches.length);
          return outcome;
        })
      )
    );

    const failed = outcomes.filter((o): o is BatchFailure => o.status === "failed");
    const summary: TranslationSummary = {
      targetLanguage: opts.targetLanguage,
      batches: batches.length,
      translatedBatches: outcomes.length - failed.length,
      failedBatches: failed.length,
      untranslatedSegments: store
        .asOrderedSequence()
        .filter((s) => s.translationStatus === "untranslated")
        .map((s) => s.index),
      abandoned: failed.some((o) => o.reason === "abandoned"),
    };

    const cancelled = opts.signal?.aborted ?? false;
    if (!cancelled && batches.length > 0 && summary.translatedBatches === 0) {
      throw new TranslationError(
        `No batch could be translated to ${opts.targetLanguage}; ${this.pool.allUnreachable() ? "all endpoints unreachable" : "all endpoints failed"}`
      );
    }
    return summary;
  }

  private async runBatch(
    store: SegmentStore,
    batch: Batch,
    batchIndex: number,
    opts: TranslatePassOptions,
    deadline: number,
    endpointLimit: (id: number) => ReturnType<typeof pLimit>
  ): Promise<BatchOutcome> {
    const candidates: EndpointState[] = this.pool.candidates(batchIndex);
    for (const endpoint of candidates) {
      for (let attempt = 1; attempt <= this.policy.attemptsPerEndpoint; attempt++) {
        if (opts.signal?.aborted) return { status: "failed", reason: "cancelled" };
        if (Date.now() > deadline) return { status: "failed", reason: "abandoned" };
        // another batch may have retired it meanwhile
        if (this.pool.health(endpoint.id) === "unreachable") break;

        try {
          const texts = await endpointLimit(endpoint.id)(() =>
            this.transport.translate(
              endpoint,
              { texts: batch.texts, source: opts.sourceLanguage, target: opts.targetLanguage },
              opts.signal
            )
          );
          this.pool.recordSuccess(endpoint.id);
          store.applyTranslations(new Map(batch.indices.map((index, k): [number, string] => [index, texts[k]])));
          return { status: "translated", endpoint: endpoint.url };
        } catch (err) {
          if (opts.signal?.aborted) return { status: "failed", reason: "cancelled" };
          this.pool.recordFailure(endpoint.id, errorMessage(err));
          if (attempt < this.policy.attemptsPerEndpoint && this.policy.retryDelayMs > 0) {
            await sleep(this.policy.retryDelayMs * attempt, opts.signal);
          }
        }
      }
    }
    return { status: "failed", reason: "exhausted" };
  }
}
