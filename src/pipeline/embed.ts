import fs from "node:fs";
import path from "node:path";
import { MOV_TEXT_CONTAINERS } from "../constants.js";
import { CancelledError, EmbeddingError, errorMessage } from "../errors.js";
import type { EmbedMode } from "../types.js";
import { runCommand } from "../utils/process.js";
import { createFfmpegProgressParser } from "./extract.js";

export interface EmbedOptions {
  outputPath: string;
  workDir: string;
  signal?: AbortSignal;
  onProgress?: (fraction: number | null) => void;
}

export interface EmbeddingService {
  embed(sourcePath: string, subtitleBlob: string, mode: EmbedMode, options: EmbedOptions): Promise<string>;
}

// The subtitles filter takes a filtergraph argument, so : \ ' [ ] , ; need escaping
export function escapeFilterPath(filePath: string): string {
  return filePath.replace(/\\/g, "/").replace(/([:'\[\],;])/g, "\\$1");
}

export function buildEmbedArgs(
  sourcePath: string,
  subtitlePath: string,
  mode: EmbedMode,
  outputPath: string,
  extraArgs: string[] = []
): string[] {
  if (mode === "hard") {
    return [
      "-y",
      "-i", sourcePath,
      "-vf", `subtitles=${escapeFilterPath(subtitlePath)}`,
      ...extraArgs,
      "-c:a", "copy",
      outputPath,
    ];
  }
  const ext = path.extname(outputPath).toLowerCase();
  const subtitleCodec = MOV_TEXT_CONTAINERS.some((container) => container === ext) ? "mov_text" : "srt";
  return [
    "-y",
    "-i", sourcePath,
    "-i", subtitlePath,
    "-map", "0",
    "-map", "1:0",
    "-c", "copy",
    "-c:s", subtitleCodec,
    outputPath,
  ];
}

export class FfmpegEmbedder implements EmbeddingService {
  constructor(private readonly ffmpegCmd: string, private readonly extraArgs: string[] = []) {}

  /** Writes a new file; the source media is never touched. Blob must be srt text. */
  async embed(sourcePath: string, subtitleBlob: string, mode: EmbedMode, options: EmbedOptions): Promise<string> {
    if (path.resolve(options.outputPath) === path.resolve(sourcePath)) {
      throw new EmbeddingError(`Output path must differ from the source: ${sourcePath}`);
    }

    fs.mkdirSync(options.workDir, { recursive: true });
    fs.mkdirSync(path.dirname(options.outputPath), { recursive: true });
    const subtitlePath = path.join(options.workDir, "embed.srt");
    fs.writeFileSync(subtitlePath, subtitleBlob, "utf-8");

    const progress = createFfmpegProgressParser(options.onProgress);
    const args = buildEmbedArgs(sourcePath, subtitlePath, mode, options.outputPath, mode === "hard" ? this.extraArgs : []);
    try {
      await runCommand(this.ffmpegCmd, args, { signal: options.signal, onStderrLine: progress.onLine });
    } catch (err) {
      fs.rmSync(options.outputPath, { force: true });
      if (options.signal?.aborted) throw new CancelledError();
      throw new EmbeddingError(`Embedding (${mode}) failed: ${errorMessage(err)}`, err);
    }

    const stat = fs.statSync(options.outputPath, { throwIfNoEntry: false });
    if (!stat || stat.size === 0) {
      throw new EmbeddingError(`ffmpeg produced no output at ${options.outputPath}`);
    }
    return options.outputPath;
  }
}
