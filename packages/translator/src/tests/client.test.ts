/**
 * Provider client — mock fetch, zero network calls.
 */
import { describe, expect, it } from "vitest";
import { OpenAICompatibleClient, ProviderApiError, ProviderResponseError, cleanJson } from "../client.js";
import { buildUserMessage } from "../prompts/translate.js";
import type { ProviderRequest } from "../types.js";
import { chatResponse, errorResponse, mockFetch } from "./fakes.js";

const ALL: ProviderRequest = {
  text: "Haus",
  source: "auto",
  targets: ["ru", "en", "de", "hy"],
  scope: ["ru", "en", "de", "hy"],
};

function client(fetchFn: ReturnType<typeof mockFetch>["fetchFn"]): OpenAICompatibleClient {
  return new OpenAICompatibleClient(
    { apiKey: "test-key", model: "test-model", baseUrl: "http://provider.test/v1" },
    fetchFn
  );
}

describe("OpenAICompatibleClient", () => {
  it("normalizes single and candidate values", async () => {
    const { fetchFn } = mockFetch(
      chatResponse(
        JSON.stringify({
          detected_language: "de",
          translations: { ru: "дом", en: [" house ", "home", "house", ""], de: "Haus", hy: "տուն" },
          annotations: { is_verb: false, de_noun: { article: "das", gender: "n", lemma: "Haus" } },
        })
      )
    );

    const result = await client(fetchFn).translate(ALL);

    expect(result).toEqual({
      detectedLanguage: "de",
      translations: { ru: "дом", en: "house, home", de: "Haus", hy: "տուն" },
      annotations: {
        isVerb: false,
        infinitives: {},
        pastForms: {},
        germanNoun: { article: "das", gender: "n", lemma: "Haus" },
        germanGovernance: null,
      },
    });
  });

  it("drops languages that were not requested", async () => {
    const { fetchFn } = mockFetch(
      chatResponse(JSON.stringify({ detected_language: "de", translations: { en: "father", ru: "отец" } }))
    );

    const result = await client(fetchFn).translate({ text: "Vater", source: "de", targets: ["en"], scope: ["en", "de"] });

    expect(result.translations).toEqual({ en: "father" });
  });

  it("accepts a fenced JSON body", async () => {
    const body = JSON.stringify({ detected_language: "en", translations: { de: "Haus" } });
    const { fetchFn } = mockFetch(chatResponse("```json\n" + body + "\n```"));

    const result = await client(fetchFn).translate({ text: "house", source: "auto", targets: ["de"], scope: ["en", "de"] });

    expect(result.translations).toEqual({ de: "Haus" });
  });

  it("drops a malformed annotation field without failing", async () => {
    const { fetchFn } = mockFetch(
      chatResponse(
        JSON.stringify({
          detected_language: "de",
          translations: { en: "cardboard" },
          annotations: { is_verb: "yes", de_noun: { article: "die" } },
        })
      )
    );

    const result = await client(fetchFn).translate({ text: "Pappe", source: "auto", targets: ["en"], scope: ["en", "de"] });

    expect(result.translations).toEqual({ en: "cardboard" });
    expect(result.annotations.isVerb).toBe(false);
    expect(result.annotations.germanNoun).toBeNull();
  });

  it("maps past forms into the canonical shape", async () => {
    const { fetchFn } = mockFetch(
      chatResponse(
        JSON.stringify({
          detected_language: "de",
          translations: { en: "went" },
          annotations: {
            is_verb: true,
            infinitives: { en: "to go" },
            past_forms: { en_past_simple: "went", en_past_participle: "gone", de_perfekt: "ist gegangen", de_prateritum: "ging", ru_past: "" },
          },
        })
      )
    );

    const result = await client(fetchFn).translate({ text: "ging", source: "de", targets: ["en"], scope: ["en", "de"] });

    expect(result.annotations.infinitives).toEqual({ en: "to go" });
    expect(result.annotations.pastForms).toEqual({
      enPastSimple: "went",
      enPastParticiple: "gone",
      dePerfekt: "ist gegangen",
      dePraeteritum: "ging",
    });
  });

  it("rejects a response outside the schema", async () => {
    const { fetchFn } = mockFetch(chatResponse(JSON.stringify({ detected_language: "fr", translations: {} })));
    await expect(client(fetchFn).translate(ALL)).rejects.toBeInstanceOf(ProviderResponseError);
  });

  it("rejects a body that is not JSON", async () => {
    const { fetchFn } = mockFetch(chatResponse("Sorry, I cannot help with that."));
    await expect(client(fetchFn).translate(ALL)).rejects.toBeInstanceOf(ProviderResponseError);
  });

  it("marks auth failures as non-retryable", async () => {
    const { fetchFn } = mockFetch(errorResponse(401, "bad key"));

    const err: unknown = await client(fetchFn).translate(ALL).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderApiError);
    expect(err).toMatchObject({ statusCode: 401, retryable: false, message: "Provider API error 401: bad key" });
  });

  it("marks server errors as retryable", async () => {
    const { fetchFn } = mockFetch(errorResponse(503, "overloaded"));
    await expect(client(fetchFn).translate(ALL)).rejects.toMatchObject({ statusCode: 503, retryable: true });
  });

  it("sends a JSON-mode request with the bearer key", async () => {
    const { fetchFn, calls } = mockFetch(
      chatResponse(JSON.stringify({ detected_language: "de", translations: { en: "father" } }))
    );

    await client(fetchFn).translate({ text: "Vater", source: "de", targets: ["en"], scope: ["en", "de"] });

    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe("http://provider.test/v1/chat/completions");
    expect(calls[0]?.init.headers).toMatchObject({ Authorization: "Bearer test-key" });
    const body: unknown = JSON.parse(String(calls[0]?.init.body));
    expect(body).toMatchObject({ model: "test-model", temperature: 0, response_format: { type: "json_object" } });
  });

  it("tracks token usage", async () => {
    const { fetchFn } = mockFetch(chatResponse(JSON.stringify({ detected_language: "en", translations: { de: "Haus" } })));
    const c = client(fetchFn);

    await c.translate({ text: "house", source: "auto", targets: ["de"], scope: ["en", "de"] });

    expect(c.getUsageSummary()).toEqual({ totalInputTokens: 10, totalOutputTokens: 5, calls: 1 });
  });
});

describe("buildUserMessage", () => {
  it("passes a fixed source through", () => {
    const message = buildUserMessage({ text: "Vater", source: "de", targets: ["en"], scope: ["en", "de"] });
    expect(message).toContain('"forced_source":"de"');
    expect(message).toContain('"requested_targets":["en"]');
  });

  it("leaves the source open for detection", () => {
    expect(buildUserMessage(ALL)).toContain('"forced_source":null');
  });
});

describe("cleanJson", () => {
  it("strips code fences", () => {
    expect(cleanJson('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });
});
