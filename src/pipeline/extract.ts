import fs from "node:fs";
import path from "node:path";
import { AUDIO_CHANNELS, AUDIO_SAMPLE_RATE } from "../constants.js";
import { CancelledError, ExtractionError, errorMessage } from "../errors.js";
import { runCommand } from "../utils/process.js";

export interface AudioHandle {
  path: string;
  sampleRate: number;
  channels: number;
  durationMs?: number;
}

export interface ExtractOptions {
  workDir: string;
  signal?: AbortSignal;
  onProgress?: (fraction: number | null) => void;
}

export interface MediaExtractor {
  extract(sourcePath: string, options: ExtractOptions): Promise<AudioHandle>;
}

const DURATION_RE = /Duration:\s*(\d+):(\d{2}):(\d{2}(?:\.\d+)?)/;
const TIME_RE = /\btime=\s*(\d+):(\d{2}):(\d{2}(?:\.\d+)?)/;

function hmsToMs(h: string, m: string, s: string): number {
  return Math.round((parseInt(h, 10) * 3600 + parseInt(m, 10) * 60 + parseFloat(s)) * 1000);
}

/** Tracks ffmpeg's stderr: the input duration first, then `time=` lines while encoding. */
export function createFfmpegProgressParser(onProgress?: (fraction: number | null) => void) {
  let durationMs: number | undefined;
  return {
    get durationMs() {
      return durationMs;
    },
    onLine(line: string) {
      const duration = DURATION_RE.exec(line);
      if (duration && durationMs === undefined) {
        durationMs = hmsToMs(duration[1], duration[2], duration[3]);
        return;
      }
      const time = TIME_RE.exec(line);
      if (time) {
        const fraction = durationMs ? Math.min(1, hmsToMs(time[1], time[2], time[3]) / durationMs) : null;
        onProgress?.(fraction);
      }
    },
  };
}

export class FfmpegExtractor implements MediaExtractor {
  constructor(private readonly ffmpegCmd: string) {}

  async extract(sourcePath: string, options: ExtractOptions): Promise<AudioHandle> {
    try {
      await fs.promises.access(sourcePath, fs.constants.R_OK);
    } catch (err) {
      throw new ExtractionError(`Source file is not readable: ${sourcePath}`, err);
    }

    fs.mkdirSync(options.workDir, { recursive: true });
    const outPath = path.join(options.workDir, "audio_16k_mono.wav");
    const progress = createFfmpegProgressParser(options.onProgress);

    const args = [
      "-y",
      "-i", sourcePath,
      "-vn",
      "-map", "0:a:0",
      "-acodec", "pcm_s16le",
      "-ar", String(AUDIO_SAMPLE_RATE),
      "-ac", String(AUDIO_CHANNELS),
      outPath,
    ];

    try {
      await runCommand(this.ffmpegCmd, args, { signal: options.signal, onStderrLine: progress.onLine });
    } catch (err) {
      if (options.signal?.aborted) throw new CancelledError();
      throw new ExtractionError(`Audio extraction failed: ${errorMessage(err)}`, err);
    }

    const stat = fs.statSync(outPath, { throwIfNoEntry: false });
    if (!stat || stat.size === 0) {
      throw new ExtractionError(`ffmpeg produced no audio for ${sourcePath}`);
    }
    options.onProgress?.(1);

    return {
      path: outPath,
      sampleRate: AUDIO_SAMPLE_RATE,
      channels: AUDIO_CHANNELS,
      durationMs: progress.durationMs,
    };
  }
}
