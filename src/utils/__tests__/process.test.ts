import { describe, expect, it } from "vitest";
import { CommandAbortedError, CommandError, runCommand } from "../process.js";

const node = process.execPath;

describe("runCommand", () => {
  it("collects output line by line, splitting on carriage returns", async () => {
    const stderrLines: string[] = [];
    const result = await runCommand(node, ["-e", "process.stdout.write('a\\nb\\r'); process.stderr.write('warn\\n')"], {
      onStderrLine: (line) => stderrLines.push(line),
    });
    expect(result).toEqual({ stdout: "a\nb", stderr: "warn", exitCode: 0 });
    expect(stderrLines).toEqual(["warn"]);
  });

  it("rejects on a non-zero exit with the stderr excerpt", async () => {
    const error = await runCommand(node, ["-e", "console.error('bad input'); process.exit(3)"]).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CommandError);
    expect(error).toMatchObject({ exitCode: 3, stderrExcerpt: "bad input" });
  });

  it("terminates the process when aborted", async () => {
    const controller = new AbortController();
    const pending = runCommand(node, ["-e", "setTimeout(() => {}, 10000)"], { signal: controller.signal });
    setTimeout(() => controller.abort(), 100);
    await expect(pending).rejects.toBeInstanceOf(CommandAbortedError);
  });

  it("does not start when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(runCommand(node, ["-e", ""], { signal: controller.signal })).rejects.toMatchObject({ name: "AbortError" });
  });

  it("times out long runs", async () => {
    await expect(runCommand(node, ["-e", "setTimeout(() => {}, 10000)"], { timeoutMs: 100 })).rejects.toThrow(
      `Command timed out after 100ms (${node})`
    );
  });
});
