import Fastify, { type FastifyReply } from "fastify";
import { z } from "zod";
import path from "node:path";
import { AUTO_LANGUAGE, SUBTITLE_FORMATS } from "./constants.js";
import { PipelineError, type ErrorCode } from "./errors.js";
import type { JobController } from "./job/controller.js";
import { logger as rootLogger, type Logger } from "./logger.js";
import type { JobRequest } from "./types.js";

export interface AppDeps {
  jobs: JobController;
  apiKey?: string;
  logger?: Logger;
  /** Extra fields for /healthz, e.g. translation endpoint health. */
  health?: () => Record<string, unknown>;
}

const OutputSchema = z.object({
  mode: z.enum(["file", "embed", "both"]).default("file"),
  formats: z.array(z.enum(SUBTITLE_FORMATS)).min(1).default(["srt"]),
  embedMode: z.enum(["soft", "hard"]).default("soft"),
  outputDir: z.string().min(1).optional(),
});

const CreateJobSchema = z.object({
  sourcePath: z.string().min(1),
  sourceLanguage: z.string().min(1).default(AUTO_LANGUAGE),
  targetLanguage: z.string().min(1).optional(),
  output: OutputSchema.default({}),
});

const FinalizeSchema = OutputSchema.partial();

const SegmentParamsSchema = z.object({ index: z.coerce.number().int().min(0) });

const SegmentPatchSchema = z
  .object({ text: z.string().optional(), translation: z.string().optional() })
  .refine((b) => b.text !== undefined || b.translation !== undefined, {
    message: "text or translation is required",
  });

// text/plain srt or vtt document
const ImportSchema = z.string().min(1);

const SubtitleQuerySchema = z.object({
  format: z.enum(SUBTITLE_FORMATS).default("srt"),
  text: z.enum(["translated", "original", "bilingual"]).default("translated"),
  cueIds: z
    .enum(["true", "false"])
    .optional()
    .transform((v) => v === "true"),
});

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  EXTRACTION: 500,
  TRANSCRIPTION: 500,
  TRANSLATION: 500,
  EXPORT: 400,
  EMBEDDING: 500,
  CANCELLED: 409,
  INDEX: 404,
  JOB_CONFLICT: 409,
  INVALID_STATE: 409,
};

function badRequest(reply: FastifyReply, error: z.ZodError) {
  return reply.code(400).send({ error: "Invalid request", issues: error.issues });
}

export function buildApp(deps: AppDeps) {
  const { jobs } = deps;
  const app = Fastify({
    loggerInstance: deps.logger ?? rootLogger,
    // finalize with embedding can run for a long time
    requestTimeout: 0,
  });

  app.addHook("preHandler", async (request, reply) => {
    if (!deps.apiKey || request.routeOptions.url === "/healthz") return;
    if (request.headers["x-api-key"] !== deps.apiKey) {
      return reply.code(401).send({ error: "Unauthorized: Invalid or missing API key" });
    }
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof PipelineError) {
      const status = STATUS_BY_CODE[error.code];
      if (status >= 500) request.log.error({ err: error }, "request failed");
      return reply.code(status).send({ error: error.message, code: error.code, stage: error.stage });
    }
    // fastify's own errors (bad JSON, payload too large) carry a client status
    const reported = error instanceof Error && "statusCode" in error && typeof error.statusCode === "number" ? error.statusCode : 500;
    const status = reported < 500 ? reported : 500;
    if (status >= 500) request.log.error({ err: error }, "unhandled error");
    return reply.code(status).send({ error: status < 500 && error instanceof Error ? error.message : "Internal server error" });
  });

  const noJob = (reply: FastifyReply) => reply.code(404).send({ error: "No job has been started" });

  app.post("/v1/jobs", async (req, reply) => {
    const parsed = CreateJobSchema.safeParse(req.body ?? {});
    if (!parsed.success) return badRequest(reply, parsed.error);
    const request: JobRequest = { ...parsed.data, sourcePath: path.resolve(parsed.data.sourcePath) };
    const job = jobs.start(request);
    return reply.code(202).send({ job, message: "Job accepted for processing." });
  });

  app.get("/v1/jobs/current", async (req, reply) => {
    const job = jobs.snapshot();
    if (!job) return noJob(reply);
    return { job };
  });

  app.post("/v1/jobs/current/cancel", async (req, reply) => {
    if (!jobs.snapshot()) return noJob(reply);
    return { job: jobs.cancel() };
  });

  app.get("/v1/jobs/current/segments", async (req, reply) => {
    if (!jobs.snapshot()) return noJob(reply);
    return { revision: jobs.store.revision, segments: jobs.segments() };
  });

  app.put("/v1/jobs/current/segments", async (req, reply) => {
    if (!jobs.snapshot()) return noJob(reply);
    const body = ImportSchema.safeParse(req.body);
    if (!body.success) return badRequest(reply, body.error);
    return { revision: jobs.store.revision, segments: jobs.importSubtitles(body.data) };
  });

  app.patch("/v1/jobs/current/segments/:index", async (req, reply) => {
    if (!jobs.snapshot()) return noJob(reply);
    const params = SegmentParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const body = SegmentPatchSchema.safeParse(req.body ?? {});
    if (!body.success) return badRequest(reply, body.error);

    const { index } = params.data;
    const { text, translation } = body.data;
    if (text !== undefined) jobs.editText(index, text);
    if (translation !== undefined) jobs.editTranslation(index, translation);
    return { segment: jobs.store.get(index), revision: jobs.store.revision };
  });

  app.get("/v1/jobs/current/subtitles", async (req, reply) => {
    if (!jobs.snapshot()) return noJob(reply);
    const query = SubtitleQuerySchema.safeParse(req.query);
    if (!query.success) return badRequest(reply, query.error);
    const { format, text, cueIds } = query.data;
    const blob = jobs.render(format, { text, cueIds });
    return reply.type(format === "vtt" ? "text/vtt; charset=utf-8" : "application/x-subrip; charset=utf-8").send(blob);
  });

  app.post("/v1/jobs/current/finalize", async (req, reply) => {
    if (!jobs.snapshot()) return noJob(reply);
    const parsed = FinalizeSchema.safeParse(req.body ?? {});
    if (!parsed.success) return badRequest(reply, parsed.error);
    const artifacts = await jobs.finalize(parsed.data);
    return { artifacts, job: jobs.snapshot() };
  });

  app.get("/v1/jobs/current/stats", async (req, reply) => {
    if (!jobs.snapshot()) return noJob(reply);
    return { stats: jobs.stats() };
  });

  app.get("/healthz", async () => ({ ok: true, busy: jobs.active, ...(deps.health?.() ?? {}) }));

  return app;
}
