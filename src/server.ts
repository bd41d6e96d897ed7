import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";
import { JobController } from "./job/controller.js";
import { componentLogger, logger } from "./logger.js";
import { FfmpegEmbedder } from "./pipeline/embed.js";
import { createEngineHandle, TranscriptionAdapter } from "./pipeline/engine.js";
import { FfmpegExtractor } from "./pipeline/extract.js";
import { TranslationCoordinator } from "./translate/coordinator.js";
import { EndpointPool } from "./translate/endpointPool.js";
import { LibreTranslateClient } from "./translate/libreTranslate.js";

const cfg = loadConfig();
logger.level = cfg.logLevel;

const pool = new EndpointPool(cfg.translation.endpoints, cfg.translation.unreachableAfter, componentLogger("endpoints"));
const jobs = new JobController({
  extractor: new FfmpegExtractor(cfg.ffmpegCmd),
  transcriber: new TranscriptionAdapter(createEngineHandle(cfg, componentLogger("engine"))),
  translator: new TranslationCoordinator(
    pool,
    new LibreTranslateClient(cfg.translation.requestTimeoutMs),
    cfg.translation,
    componentLogger("translate")
  ),
  embedder: new FfmpegEmbedder(cfg.ffmpegCmd, cfg.ffmpegExtraArgs),
  workDir: cfg.workDir,
  stageWeights: cfg.stageWeights,
  log: componentLogger("jobs"),
});

const app = buildApp({
  jobs,
  apiKey: cfg.apiKey,
  health: () => ({
    endpoints: pool.snapshot().map((e) => ({ url: e.url, health: e.health, lastError: e.lastError })),
  }),
});

async function shutdown(signal: string) {
  app.log.info({ signal }, "shutting down");
  if (jobs.active) {
    jobs.cancel();
    await jobs.settled();
  }
  await app.close();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      app.log.error({ err }, "shutdown failed");
      process.exit(1);
    });
  });
}

try {
  await app.listen({ port: cfg.port, host: cfg.host });
  app.log.info(`listening on ${cfg.host}:${cfg.port}`);
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
