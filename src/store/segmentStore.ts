import { IndexError } from "../errors.js";
import type { Segment, TimedText } from "../types.js";

/**
 * Canonical subtitle segments for the active job.
 *
 * Every mutation builds a new frozen array and swaps it in, so a reader holding the
 * result of `asOrderedSequence()` keeps a consistent snapshot while the pipeline writes.
 */
export class SegmentStore {
  private segments: readonly Segment[] = Object.freeze([]);
  private rev = 0;

  get size(): number {
    return this.segments.length;
  }

  /** Bumped on every mutation; lets pollers skip unchanged snapshots. */
  get revision(): number {
    return this.rev;
  }

  clear(): void {
    this.commit([]);
  }

  /**
   * Loads engine output. Indices follow output order; cues are stably ordered by start
   * time and a negative duration is collapsed to zero.
   */
  replaceAll(items: readonly TimedText[]): void {
    const ordered = items
      .map((item, order) => ({ item, order }))
      .sort((a, b) => a.item.startMs - b.item.startMs || a.order - b.order)
      .map(({ item }, index): Segment => {
        const startMs = Math.max(0, Math.round(item.startMs));
        return {
          index,
          startMs,
          endMs: Math.max(startMs, Math.round(item.endMs)),
          text: item.text,
          translationStatus: "none",
        };
      });
    this.commit(ordered);
  }

  get(index: number): Segment {
    this.assertIndex(index);
    return this.segments[index];
  }

  asOrderedSequence(): readonly Segment[] {
    return this.segments;
  }

  /** A changed line drops the translation made from its old text, so exports show the edit. */
  editText(index: number, text: string): Segment {
    return this.update(index, (s): Segment =>
      s.translationStatus === "translated" && s.text !== text
        ? { ...s, text, translation: undefined, translationStatus: "none" }
        : { ...s, text }
    );
  }

  editTranslation(index: number, translation: string): Segment {
    return this.update(index, (s) => ({ ...s, translation, translationStatus: "translated" }));
  }

  /** Writes one batch outcome back; indices not present in the store are ignored. */
  applyTranslations(translations: ReadonlyMap<number, string>): void {
    if (translations.size === 0) return;
    this.commit(
      this.segments.map((s): Segment => {
        const translation = translations.get(s.index);
        return translation === undefined ? s : { ...s, translation, translationStatus: "translated" };
      })
    );
  }

  markUntranslated(indices: Iterable<number>): void {
    const flagged = new Set(indices);
    if (flagged.size === 0) return;
    this.commit(
      this.segments.map((s): Segment =>
        flagged.has(s.index) && s.translationStatus !== "translated"
          ? { ...s, translation: undefined, translationStatus: "untranslated" }
          : s
      )
    );
  }

  /** Drops every translation, e.g. before a new translation pass. */
  resetTranslations(): void {
    this.commit(this.segments.map((s): Segment => ({ ...s, translation: undefined, translationStatus: "none" })));
  }

  private update(index: number, fn: (segment: Segment) => Segment): Segment {
    this.assertIndex(index);
    const next = this.segments.slice();
    next[index] = fn(next[index]);
    this.commit(next);
    return this.segments[index];
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.segments.length) {
      throw new IndexError(index, this.segments.length);
    }
  }

  private commit(next: Segment[]): void {
    this.segments = Object.freeze(next.map((s) => Object.freeze(s)));
    this.rev += 1;
  }
}
