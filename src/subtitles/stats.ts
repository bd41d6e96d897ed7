import type { Segment } from "../types.js";

export interface SubtitleStats {
  count: number;
  totalDurationMs: number;
  avgDurationMs: number;
  totalChars: number;
  avgChars: number;
  maxChars: number;
  totalWords: number;
  charsPerSecond: number;
  wordsPerMinute: number;
  untranslated: number;
}

function displayText(s: Segment): string {
  return s.translationStatus === "translated" && s.translation !== undefined ? s.translation : s.text;
}

// Reading speed is measured over cue time, not media duration
export function subtitleStats(segments: readonly Segment[]): SubtitleStats {
  let totalDurationMs = 0;
  let totalChars = 0;
  let maxChars = 0;
  let totalWords = 0;
  let untranslated = 0;

  for (const s of segments) {
    const text = displayText(s);
    totalDurationMs += s.endMs - s.startMs;
    totalChars += text.length;
    maxChars = Math.max(maxChars, text.length);
    totalWords += text.split(/\s+/).filter(Boolean).length;
    if (s.translationStatus === "untranslated") untranslated += 1;
  }

  const count = segments.length;
  const seconds = totalDurationMs / 1000;
  return {
    count,
    totalDurationMs,
    avgDurationMs: count ? totalDurationMs / count : 0,
    totalChars,
    avgChars: count ? totalChars / count : 0,
    maxChars,
    totalWords,
    charsPerSecond: seconds > 0 ? totalChars / seconds : 0,
    wordsPerMinute: seconds > 0 ? (totalWords / seconds) * 60 : 0,
    untranslated,
  };
}
