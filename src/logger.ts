import { pino, type Logger } from "pino";

export type { Logger };

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || "info",
  base: { service: "subline" },
  redact: ["req.headers['x-api-key']", "apiKey"],
});

export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
