import { spawn } from "node:child_process";
import { COMMAND_ERROR_EXCERPT_LINES } from "../constants.js";

export interface RunCommandOptions {
  cwd?: string;
  timeoutMs?: number;
  env?: Record<string, string>;
  signal?: AbortSignal;
  onStdoutLine?: (line: string) => void;
  onStderrLine?: (line: string) => void;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export class CommandError extends Error {
  readonly exitCode: number | null;
  readonly stderrExcerpt: string;

  constructor(message: string, exitCode: number | null, stderrExcerpt: string) {
    super(message);
    this.name = "CommandError";
    this.exitCode = exitCode;
    this.stderrExcerpt = stderrExcerpt;
  }
}

export class CommandAbortedError extends Error {
  constructor(command: string) {
    super(`Command aborted: ${command}`);
    this.name = "AbortError";
  }
}

// ffmpeg and whisper.cpp both report progress with carriage returns
function createLineBuffer(onLine: (line: string) => void) {
  let buffer = "";
  return {
    push(chunk: string) {
      buffer += chunk;
      const parts = buffer.split(/\r\n|\r|\n/);
      buffer = parts.pop() ?? "";
      for (const part of parts) {
        const line = part.trim();
        if (line) onLine(line);
      }
    },
    flush() {
      const line = buffer.trim();
      if (line) onLine(line);
      buffer = "";
    },
  };
}

/**
 * Spawns an external process without a shell. Resolves on exit code 0, rejects with
 * CommandError otherwise. Aborting `signal` sends SIGTERM and rejects with an AbortError.
 */
export async function runCommand(command: string, args: string[], options?: RunCommandOptions): Promise<CommandResult> {
  if (options?.signal?.aborted) {
    throw new CommandAbortedError(command);
  }

  const child = spawn(command, args, {
    cwd: options?.cwd,
    env: { ...process.env, ...options?.env },
    stdio: ["ignore", "pipe", "pipe"],
  });

  const stdoutLines: string[] = [];
  const stderrExcerpt: string[] = [];
  const stdout = createLineBuffer((line) => {
    stdoutLines.push(line);
    options?.onStdoutLine?.(line);
  });
  const stderr = createLineBuffer((line) => {
    stderrExcerpt.push(line);
    if (stderrExcerpt.length > COMMAND_ERROR_EXCERPT_LINES) stderrExcerpt.shift();
    options?.onStderrLine?.(line);
  });

  child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk.toString("utf8")));
  child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk.toString("utf8")));

  return await new Promise<CommandResult>((resolve, reject) => {
    let aborted = false;
    let timedOut = false;

    const onAbort = () => {
      aborted = true;
      child.kill("SIGTERM");
    };
    options?.signal?.addEventListener("abort", onAbort, { once: true });

    const timer =
      options?.timeoutMs && options.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGTERM");
          }, options.timeoutMs)
        : null;

    const cleanup = () => {
      options?.signal?.removeEventListener("abort", onAbort);
      if (timer) clearTimeout(timer);
    };

    child.on("error", (err) => {
      cleanup();
      reject(err);
    });

    child.on("close", (code) => {
      cleanup();
      stdout.flush();
      stderr.flush();
      const excerpt = stderrExcerpt.join("\n");
      if (aborted) {
        reject(new CommandAbortedError(command));
        return;
      }
      if (timedOut) {
        reject(new CommandError(`Command timed out after ${options?.timeoutMs}ms (${command})`, code, excerpt));
        return;
      }
      if (code !== 0) {
        reject(new CommandError(`Command failed (${command} ${args.join(" ")}): code=${code}\nSTDERR: ${excerpt}`, code, excerpt));
        return;
      }
      resolve({ stdout: stdoutLines.join("\n"), stderr: excerpt, exitCode: 0 });
    });
  });
}
