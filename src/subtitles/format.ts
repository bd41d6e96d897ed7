import { ExportError } from "../errors.js";
import type { Segment, TimedText } from "../types.js";
import { formatTimestamp, parseTimestamp } from "./timecode.js";

export type TextSource = "translated" | "original" | "bilingual";

export interface ExportOptions {
  text?: TextSource;
  cueIds?: boolean; // vtt only
}

export interface ParsedCue extends TimedText {
  id?: string;
}

// Blank lines would end the cue early, so they are dropped
function cueLines(text: string): string[] {
  return text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .filter((line) => line.trim() !== "");
}

function escapeVtt(line: string): string {
  return line.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function unescapeVtt(line: string): string {
  return line.replace(/&lt;/g, "<").replace(/&gt;/g, ">").replace(/&nbsp;/g, " ").replace(/&amp;/g, "&");
}

function segmentText(segment: Segment, source: TextSource): string {
  const translated = segment.translationStatus === "translated" ? segment.translation : undefined;
  switch (source) {
    case "original":
      return segment.text;
    case "bilingual":
      return translated && translated !== segment.text ? `${segment.text}\n${translated}` : segment.text;
    case "translated":
      return translated ?? segment.text;
  }
}

function toSrt(segments: readonly Segment[], source: TextSource): string {
  return segments
    .map(
      (s, i) =>
        `${i + 1}\n${formatTimestamp(s.startMs, ",")} --> ${formatTimestamp(s.endMs, ",")}\n${cueLines(
          segmentText(s, source)
        ).join("\n")}\n`
    )
    .join("\n");
}

function toVtt(segments: readonly Segment[], source: TextSource, cueIds: boolean): string {
  return `WEBVTT\n\n${segments
    .map((s, i) => {
      const id = cueIds ? `${i + 1}\n` : "";
      const text = cueLines(segmentText(s, source)).map(escapeVtt).join("\n");
      return `${id}${formatTimestamp(s.startMs, ".")} --> ${formatTimestamp(s.endMs, ".")}\n${text}\n`;
    })
    .join("\n")}`;
}

/**
 * Serializes segments in store order. Cue numbers are dense and 1-based regardless of
 * the segments' own indices. Throws ExportError only for an unknown format tag.
 */
export function exportSubtitles(segments: readonly Segment[], format: string, options: ExportOptions = {}): string {
  const source = options.text ?? "translated";
  if (format === "srt") return toSrt(segments, source);
  if (format === "vtt") return toVtt(segments, source, options.cueIds ?? false);
  throw new ExportError(`Unsupported subtitle format: ${format}`);
}

/** Parses srt or vtt text; the format is detected from the WEBVTT header. */
export function parseSubtitles(content: string): ParsedCue[] {
  const normalized = content.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
  const isVtt = /^WEBVTT(?:[ \t].*)?(?:\n|$)/.test(normalized);
  const cues: ParsedCue[] = [];

  for (const block of normalized.split(/\n{2,}/)) {
    const lines = block.split("\n").filter((line, i, all) => i < all.length - 1 || line !== "");
    const timingAt = lines.findIndex((line) => line.includes("-->"));
    if (timingAt < 0) continue; // header, NOTE, STYLE or stray text

    const [rawStart, rawRest] = lines[timingAt].split("-->");
    const startMs = parseTimestamp(rawStart);
    const endMs = parseTimestamp((rawRest ?? "").trim().split(/\s+/)[0] ?? "");
    if (startMs === null || endMs === null) continue;

    const id = timingAt > 0 ? lines[timingAt - 1].trim() : undefined;
    const textLines = lines.slice(timingAt + 1);
    cues.push({
      ...(id ? { id } : {}),
      startMs,
      endMs,
      text: (isVtt ? textLines.map(unescapeVtt) : textLines).join("\n"),
    });
  }
  return cues;
}
