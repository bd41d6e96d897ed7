import { fetch, type Dispatcher } from "undici";
import { z } from "zod";
import type { EndpointConfig } from "../config.js";
import { linkSignals } from "../utils/signal.js";

export interface TranslationRequest {
  texts: string[];
  source: string;
  target: string;
}

export interface TranslationTransport {
  translate(endpoint: EndpointConfig, request: TranslationRequest, signal?: AbortSignal): Promise<string[]>;
}

const ResponseSchema = z.union([
  z.object({ translatedText: z.union([z.string(), z.array(z.string())]) }),
  z.object({ error: z.string() }),
]);

export class TranslationHttpError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "TranslationHttpError";
  }
}

/** LibreTranslate `/translate` client; one request carries a whole batch as `q: string[]`. */
export class LibreTranslateClient implements TranslationTransport {
  constructor(private readonly timeoutMs: number, private readonly dispatcher?: Dispatcher) {}

  async translate(endpoint: EndpointConfig, request: TranslationRequest, signal?: AbortSignal): Promise<string[]> {
    const linked = linkSignals(AbortSignal.timeout(this.timeoutMs), signal);
    try {
      const res = await fetch(`${endpoint.url}/translate`, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify({
          q: request.texts,
          source: request.source,
          target: request.target,
          format: "text",
          ...(endpoint.apiKey ? { api_key: endpoint.apiKey } : {}),
        }),
        dispatcher: this.dispatcher,
        signal: linked.signal,
      });

      if (!res.ok) {
        const text = await res.text();
        throw new TranslationHttpError(`Translation failed: ${res.status} ${text.slice(0, 200)}`, res.status);
      }

      const parsed = ResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new TranslationHttpError("Malformed translation response");
      }
      if ("error" in parsed.data) {
        throw new TranslationHttpError(`Translation service error: ${parsed.data.error}`, res.status);
      }

      const translated = parsed.data.translatedText;
      const texts = typeof translated === "string" ? [translated] : translated;
      if (texts.length !== request.texts.length) {
        throw new TranslationHttpError(
          `Translation returned ${texts.length} texts for a batch of ${request.texts.length}`
        );
      }
      return texts;
    } finally {
      linked.dispose();
    }
  }
}
