import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { buildApp } from "../app.js";
import { createTestController, silentLog } from "../job/__tests__/fakes.js";

const headers = { "x-api-key": "test-secret" };

describe("HTTP routes", () => {
  let dir: string;
  let setup: ReturnType<typeof createTestController>;
  let app: ReturnType<typeof buildApp>;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "app-"));
    setup = createTestController(path.join(dir, "work"));
    app = buildApp({ jobs: setup.jobs, apiKey: "test-secret", logger: silentLog });
  });

  afterEach(async () => {
    await app.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const createBody = () => ({ sourcePath: path.join(dir, "clip.mp4"), sourceLanguage: "en" });

  it("serves health without a key", async () => {
    const res = await app.inject({ method: "GET", url: "/healthz" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, busy: false });
  });

  it("requires the api key elsewhere", async () => {
    const res = await app.inject({ method: "GET", url: "/v1/jobs/current" });
    expect(res.statusCode).toBe(401);
  });

  it("answers 404 before any job exists", async () => {
    const res = await app.inject({ method: "GET", url: "/v1/jobs/current", headers });
    expect(res.statusCode).toBe(404);
  });

  it("validates job requests", async () => {
    const res = await app.inject({ method: "POST", url: "/v1/jobs", headers, payload: { sourceLanguage: "en" } });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: "Invalid request" });
  });

  it("passes body parse errors through as client errors", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/jobs",
      headers: { ...headers, "content-type": "application/json" },
      payload: "{not json",
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).not.toBe("Internal server error");
  });

  it("runs a job through edit and finalize", async () => {
    const created = await app.inject({ method: "POST", url: "/v1/jobs", headers, payload: createBody() });
    expect(created.statusCode).toBe(202);
    expect(created.json().job).toMatchObject({
      id: "job-1",
      state: "extracting",
      request: { output: { mode: "file", formats: ["srt"], embedMode: "soft" } },
    });
    await setup.jobs.settled();

    const segments = await app.inject({ method: "GET", url: "/v1/jobs/current/segments", headers });
    expect(segments.json().segments).toHaveLength(3);

    const patched = await app.inject({
      method: "PATCH",
      url: "/v1/jobs/current/segments/1",
      headers,
      payload: { text: "Earth" },
    });
    expect(patched.statusCode).toBe(200);
    expect(patched.json().segment).toMatchObject({ index: 1, text: "Earth" });

    const missing = await app.inject({
      method: "PATCH",
      url: "/v1/jobs/current/segments/9",
      headers,
      payload: { text: "nope" },
    });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toMatchObject({ code: "INDEX" });

    const vtt = await app.inject({ method: "GET", url: "/v1/jobs/current/subtitles?format=vtt", headers });
    expect(vtt.headers["content-type"]).toBe("text/vtt; charset=utf-8");
    expect(vtt.body).toBe(
      "WEBVTT\n\n00:00:00.000 --> 00:00:01.000\nHello\n\n" +
        "00:00:01.000 --> 00:00:02.000\nEarth\n\n" +
        "00:00:02.000 --> 00:00:03.000\nGoodbye\n"
    );

    const stats = await app.inject({ method: "GET", url: "/v1/jobs/current/stats", headers });
    expect(stats.json().stats).toMatchObject({ count: 3, totalDurationMs: 3000 });

    const finalized = await app.inject({
      method: "POST",
      url: "/v1/jobs/current/finalize",
      headers,
      payload: { formats: ["vtt"] },
    });
    expect(finalized.statusCode).toBe(200);
    expect(finalized.json()).toMatchObject({
      artifacts: { subtitlePaths: { vtt: path.join(dir, "clip_en.vtt") } },
      job: { state: "completed" },
    });
  });

  it("rejects a second job with 409 and cancels the first", async () => {
    setup.engine.block = true;
    await app.inject({ method: "POST", url: "/v1/jobs", headers, payload: createBody() });
    await setup.engine.started;

    const conflict = await app.inject({ method: "POST", url: "/v1/jobs", headers, payload: createBody() });
    expect(conflict.statusCode).toBe(409);
    expect(conflict.json()).toMatchObject({ code: "JOB_CONFLICT" });

    const cancelled = await app.inject({ method: "POST", url: "/v1/jobs/current/cancel", headers });
    expect(cancelled.json().job).toMatchObject({ cancelRequested: true });
    await setup.jobs.settled();

    const current = await app.inject({ method: "GET", url: "/v1/jobs/current", headers });
    expect(current.json().job.state).toBe("cancelled");
  });

  it("replaces segments from an uploaded srt document", async () => {
    await app.inject({ method: "POST", url: "/v1/jobs", headers, payload: createBody() });
    await setup.jobs.settled();

    const res = await app.inject({
      method: "PUT",
      url: "/v1/jobs/current/segments",
      headers: { ...headers, "content-type": "text/plain" },
      payload: "1\n00:00:00,000 --> 00:00:02,000\nOnly cue\n",
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().segments).toEqual([
      { index: 0, startMs: 0, endMs: 2000, text: "Only cue", translationStatus: "none" },
    ]);
  });

  it("rejects unknown subtitle formats", async () => {
    await app.inject({ method: "POST", url: "/v1/jobs", headers, payload: createBody() });
    await setup.jobs.settled();
    const res = await app.inject({ method: "GET", url: "/v1/jobs/current/subtitles?format=ass", headers });
    expect(res.statusCode).toBe(400);
  });
});
