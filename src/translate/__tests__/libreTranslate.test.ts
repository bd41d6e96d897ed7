import { MockAgent } from "undici";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LibreTranslateClient, TranslationHttpError } from "../libreTranslate.js";

const ORIGIN = "https://lt.test";
const request = { texts: ["Hello", "World"], source: "en", target: "es" };

describe("LibreTranslateClient", () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it("sends the batch as one request and returns texts in order", async () => {
    let sent: unknown;
    agent
      .get(ORIGIN)
      .intercept({
        path: "/translate",
        method: "POST",
        body: (body) => {
          sent = JSON.parse(body);
          return true;
        },
      })
      .reply(200, { translatedText: ["Hola", "Mundo"] });

    const client = new LibreTranslateClient(1000, agent);
    const texts = await client.translate({ url: ORIGIN, apiKey: "test-secret" }, request);

    expect(texts).toEqual(["Hola", "Mundo"]);
    expect(sent).toEqual({
      q: ["Hello", "World"],
      source: "en",
      target: "es",
      format: "text",
      api_key: "test-secret",
    });
  });

  it("rejects HTTP errors with the status", async () => {
    agent.get(ORIGIN).intercept({ path: "/translate", method: "POST" }).reply(503, "busy");

    const client = new LibreTranslateClient(1000, agent);
    const error = await client.translate({ url: ORIGIN }, request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TranslationHttpError);
    expect(error).toMatchObject({ status: 503, message: "Translation failed: 503 busy" });
  });

  it("rejects service errors and short answers", async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: "/translate", method: "POST" }).reply(200, { error: "target not supported" });
    pool.intercept({ path: "/translate", method: "POST" }).reply(200, { translatedText: "Hola" });

    const client = new LibreTranslateClient(1000, agent);
    await expect(client.translate({ url: ORIGIN }, request)).rejects.toThrow(
      "Translation service error: target not supported"
    );
    await expect(client.translate({ url: ORIGIN }, request)).rejects.toThrow(
      "Translation returned 1 texts for a batch of 2"
    );
  });

  it("rejects malformed bodies", async () => {
    agent.get(ORIGIN).intercept({ path: "/translate", method: "POST" }).reply(200, { translated: [] });

    const client = new LibreTranslateClient(1000, agent);
    await expect(client.translate({ url: ORIGIN }, request)).rejects.toThrow("Malformed translation response");
  });
});
