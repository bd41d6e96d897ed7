import { describe, expect, it } from "vitest";
import { IndexError } from "../../errors.js";
import { SegmentStore } from "../segmentStore.js";

function loaded(): SegmentStore {
  const store = new SegmentStore();
  store.replaceAll([
    { startMs: 1000, endMs: 2000, text: "b" },
    { startMs: 0, endMs: 500, text: "a" },
    { startMs: 1000, endMs: 1500, text: "c" },
  ]);
  return store;
}

describe("SegmentStore", () => {
  it("orders cues by start time, keeping engine order for ties", () => {
    const store = loaded();
    expect(store.asOrderedSequence().map((s) => [s.index, s.text])).toEqual([
      [0, "a"],
      [1, "b"],
      [2, "c"],
    ]);
    expect(store.get(0).translationStatus).toBe("none");
  });

  it("clamps negative times and durations", () => {
    const store = new SegmentStore();
    store.replaceAll([{ startMs: -5, endMs: -10, text: "x" }]);
    expect(store.get(0)).toMatchObject({ startMs: 0, endMs: 0 });
  });

  it("rejects out-of-range indices", () => {
    const store = loaded();
    expect(() => store.get(3)).toThrow(IndexError);
    expect(() => store.editText(-1, "nope")).toThrow("Segment index -1 out of range (0..2)");
    expect(() => store.editTranslation(1.5, "nope")).toThrow(IndexError);
  });

  it("hands out snapshots that later edits do not touch", () => {
    const store = loaded();
    const before = store.asOrderedSequence();
    const revision = store.revision;

    const edited = store.editText(0, "z");

    expect(edited.text).toBe("z");
    expect(before[0].text).toBe("a");
    expect(Object.isFrozen(before)).toBe(true);
    expect(Object.isFrozen(before[0])).toBe(true);
    expect(store.revision).toBe(revision + 1);
  });

  it("applies translations to the given indices only", () => {
    const store = loaded();
    store.applyTranslations(new Map([[1, "B"], [7, "ignored"]]));
    expect(store.asOrderedSequence().map((s) => s.translation)).toEqual([undefined, "B", undefined]);
    expect(store.get(1).translationStatus).toBe("translated");
  });

  it("flags untranslated segments without clobbering finished ones", () => {
    const store = loaded();
    store.applyTranslations(new Map([[0, "A"]]));
    store.markUntranslated([0, 1]);
    expect(store.get(0)).toMatchObject({ translation: "A", translationStatus: "translated" });
    expect(store.get(1)).toMatchObject({ translation: undefined, translationStatus: "untranslated" });
    expect(store.get(2).translationStatus).toBe("none");
  });

  it("drops a translation once its original line is rewritten", () => {
    const store = loaded();
    store.applyTranslations(new Map([[0, "A-es"], [1, "b-es"]]));

    expect(store.editText(0, "z")).toMatchObject({ text: "z", translation: undefined, translationStatus: "none" });
    expect(store.editText(1, "b")).toMatchObject({ text: "b", translation: "b-es", translationStatus: "translated" });
  });

  it("marks a manual translation as translated", () => {
    const store = loaded();
    store.markUntranslated([2]);
    expect(store.editTranslation(2, "C")).toMatchObject({ translation: "C", translationStatus: "translated" });
  });

  it("resets translations and clears", () => {
    const store = loaded();
    store.applyTranslations(new Map([[0, "A"]]));
    store.resetTranslations();
    expect(store.get(0)).toMatchObject({ translation: undefined, translationStatus: "none" });
    store.clear();
    expect(store.size).toBe(0);
  });
});
