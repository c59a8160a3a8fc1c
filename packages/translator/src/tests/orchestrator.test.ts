/**
 * Orchestrator — fake gateway, in-memory cache.
 */
import { describe, expect, it } from "vitest";
import type { CacheKey, ParsedIntent } from "@tetraglot/shared-types";
import { MemoryCacheBackend, TranslationCache, type CacheBackend } from "../cache.js";
import { TranslationOrchestrator } from "../orchestrator.js";
import { FakeGateway, reply } from "./fakes.js";

const ALL = ["ru", "en", "de", "hy"];

function setup(gateway: FakeGateway, backend: CacheBackend = new MemoryCacheBackend()) {
  return new TranslationOrchestrator(gateway, new TranslationCache(backend));
}

const FREUNDSCHAFT = reply("de", { ru: "дружба", en: "friendship", de: "Freundschaft", hy: "ընկերություն" });

describe("auto_all", () => {
  const intent: ParsedIntent = { mode: "auto_all", text: "Freundschaft" };

  it("detects the source and translates into the other three", async () => {
    const gateway = new FakeGateway(() => FREUNDSCHAFT);

    const outcome = await setup(gateway).translate(intent);

    expect(outcome).toEqual({
      ok: true,
      fromCache: false,
      cacheKey: "auto:de,en,hy,ru:freundschaft",
      result: {
        mode: "auto_all",
        source: "de",
        targets: ["ru", "en", "hy"],
        translations: { ru: "дружба", en: "friendship", hy: "ընկերություն" },
        annotations: { isVerb: false },
      },
    });
    expect(gateway.calls).toEqual([{ text: "Freundschaft", source: "auto", targets: ALL, scope: ALL }]);
  });

  it("answers a repeat from the cache without calling the provider", async () => {
    const gateway = new FakeGateway(() => FREUNDSCHAFT);
    const orchestrator = setup(gateway);

    const first = await orchestrator.translate(intent);
    const second = await orchestrator.translate({ mode: "auto_all", text: "  freundschaft " });

    expect(gateway.calls).toHaveLength(1);
    expect(second.ok && second.fromCache).toBe(true);
    expect(second.ok && second.result).toEqual(first.ok && first.result);
  });

  it("reports an undetectable language", async () => {
    const gateway = new FakeGateway(() => reply("unknown", {}));

    expect(await setup(gateway).translate({ mode: "auto_all", text: "Blub" })).toEqual({
      ok: false,
      error: { kind: "unknown_language", text: "Blub" },
    });
  });
});

describe("default_pair", () => {
  const intent: ParsedIntent = { mode: "default_pair", pair: ["de", "en"], text: "Vater" };

  it("translates to the other side of the pair", async () => {
    const gateway = new FakeGateway(() => reply("de", { de: "Vater", en: "father" }));

    const outcome = await setup(gateway).translate(intent);

    expect(outcome.ok && outcome.result).toEqual({
      mode: "default_pair",
      source: "de",
      targets: ["en"],
      translations: { en: "father" },
      annotations: { isVerb: false },
    });
    expect(outcome.ok && outcome.cacheKey).toBe("auto:de,en:vater");
    expect(gateway.calls).toEqual([{ text: "Vater", source: "auto", targets: ["en", "de"], scope: ["en", "de"] }]);
  });

  it("rejects a detected language outside the pair", async () => {
    const gateway = new FakeGateway(() => reply("ru", { de: "Vater", en: "father" }));

    expect(await setup(gateway).translate(intent)).toEqual({
      ok: false,
      error: { kind: "unknown_language", text: "Vater" },
    });
  });
});

describe("fixed source", () => {
  it("forces the source and skips detection", async () => {
    const gateway = new FakeGateway(() => reply("en", { ru: "отец", en: "father", hy: "հայր" }));

    const outcome = await setup(gateway).translate({ mode: "forced_source", source: "de", text: "Vater" });

    expect(outcome.ok && outcome.result.source).toBe("de");
    expect(outcome.ok && outcome.result.targets).toEqual(["ru", "en", "hy"]);
    expect(outcome.ok && outcome.cacheKey).toBe("de:en,hy,ru:vater");
    expect(gateway.calls[0]).toEqual({ text: "Vater", source: "de", targets: ["ru", "en", "hy"], scope: ALL });
  });

  it("returns the same serialized result from the cache for a verb", async () => {
    const gateway = new FakeGateway(() =>
      reply(
        "de",
        { ru: "шёл", en: "went", hy: "գնաց" },
        {
          isVerb: true,
          infinitives: { ru: "идти", en: "to go", hy: "գնալ" },
          pastForms: {
            ruPast: "шёл",
            enPastSimple: "went",
            enPastParticiple: "gone",
            dePerfekt: "ist gegangen",
            dePraeteritum: "ging",
            hyPast: "գնաց",
          },
        }
      )
    );
    const orchestrator = setup(gateway);
    const intent: ParsedIntent = { mode: "forced_source", source: "de", text: "ging" };

    const first = await orchestrator.translate(intent);
    const second = await orchestrator.translate(intent);

    expect(second.ok && second.fromCache).toBe(true);
    expect(JSON.stringify(second.ok && second.result)).toBe(JSON.stringify(first.ok && first.result));
    expect(Object.keys((first.ok && first.result.annotations.pastForms) || {})).toEqual(["ru", "en", "de", "hy"]);
  });

  it("translates an explicit pair in one direction", async () => {
    const gateway = new FakeGateway(() => reply("de", { en: "father" }));

    const outcome = await setup(gateway).translate({ mode: "explicit_pair", source: "de", target: "en", text: "Vater" });

    expect(outcome.ok && outcome.result.translations).toEqual({ en: "father" });
    expect(outcome.ok && outcome.cacheKey).toBe("de:en:vater");
    expect(gateway.calls[0]).toEqual({ text: "Vater", source: "de", targets: ["en"], scope: ["en", "de"] });
  });
});

describe("refill", () => {
  it("asks again for targets the first call missed", async () => {
    const gateway = new FakeGateway((req) =>
      req.source === "auto"
        ? reply("de", { ru: "дружба", en: "friendship" })
        : reply("de", { hy: "ընկերություն" })
    );
    const backend = new MemoryCacheBackend();

    const outcome = await setup(gateway, backend).translate({ mode: "auto_all", text: "Freundschaft" });

    expect(outcome.ok && outcome.result.translations).toEqual({
      ru: "дружба",
      en: "friendship",
      hy: "ընկերություն",
    });
    expect(gateway.calls[1]).toEqual({ text: "Freundschaft", source: "de", targets: ["hy"], scope: ALL });
    expect(backend.size).toBe(1);
  });

  it("returns a partial result without caching it", async () => {
    const gateway = new FakeGateway((req) =>
      req.source === "auto" ? reply("de", { ru: "дружба", en: "friendship" }) : reply("de", {})
    );
    const backend = new MemoryCacheBackend();

    const outcome = await setup(gateway, backend).translate({ mode: "auto_all", text: "Freundschaft" });

    expect(outcome.ok && outcome.result.translations).toEqual({ ru: "дружба", en: "friendship" });
    expect(backend.size).toBe(0);
  });

  it("fails when nothing comes back at all", async () => {
    const gateway = new FakeGateway(() => reply("de", {}));

    expect(await setup(gateway).translate({ mode: "auto_all", text: "Haus" })).toEqual({
      ok: false,
      error: { kind: "provider_failure", text: "Haus" },
    });
    expect(gateway.calls).toHaveLength(2);
  });
});

describe("annotations", () => {
  it("uses infinitives and keeps past forms of the involved languages", async () => {
    const gateway = new FakeGateway(() =>
      reply("de", { en: "went" }, {
        isVerb: true,
        infinitives: { en: "to go" },
        pastForms: {
          ruPast: "шёл",
          enPastSimple: "went",
          enPastParticiple: "gone",
          dePerfekt: "ist gegangen",
          dePraeteritum: "ging",
        },
      })
    );

    const outcome = await setup(gateway).translate({ mode: "explicit_pair", source: "de", target: "en", text: "ging" });

    expect(outcome.ok && outcome.result.translations).toEqual({ en: "to go" });
    expect(outcome.ok && outcome.result.annotations).toEqual({
      isVerb: true,
      pastForms: {
        de: { perfekt: "ist gegangen", praeteritum: "ging" },
        en: { pastSimple: "went", pastParticiple: "gone" },
      },
    });
  });

  it("adds governance for a German verb", async () => {
    const gateway = new FakeGateway(() =>
      reply("ru", { de: "teilnehmen" }, {
        isVerb: true,
        infinitives: { de: "teilnehmen" },
        germanGovernance: { verb: "teilnehmen", preposition: "an", case: "Dativ" },
      })
    );

    const outcome = await setup(gateway).translate({ mode: "explicit_pair", source: "ru", target: "de", text: "участвовать" });

    expect(outcome.ok && outcome.result.annotations.germanGovernance).toEqual({
      verb: "teilnehmen",
      preposition: "an",
      case: "Dat",
    });
  });

  it("adds article and gender for a German noun", async () => {
    const gateway = new FakeGateway(() =>
      reply("ru", { de: "Pappe" }, { germanNoun: { article: "die", gender: "f", lemma: "Pappe" } })
    );

    const outcome = await setup(gateway).translate({ mode: "explicit_pair", source: "ru", target: "de", text: "картон" });

    expect(outcome.ok && outcome.result.annotations).toEqual({
      isVerb: false,
      germanNoun: { article: "die", gender: "f", lemma: "Pappe" },
    });
  });

  it("drops an inconsistent noun annotation but keeps the translation", async () => {
    const gateway = new FakeGateway(() =>
      reply("ru", { de: "Pappe" }, { germanNoun: { article: "der", gender: "f", lemma: "Pappe" } })
    );

    const outcome = await setup(gateway).translate({ mode: "explicit_pair", source: "ru", target: "de", text: "картон" });

    expect(outcome.ok && outcome.result).toMatchObject({ translations: { de: "Pappe" }, annotations: { isVerb: false } });
    expect(outcome.ok && outcome.result.annotations.germanNoun).toBeUndefined();
  });
});

describe("failures", () => {
  it("maps a gateway error to provider_failure", async () => {
    const gateway = new FakeGateway(() => new Error("socket hang up"));

    expect(await setup(gateway).translate({ mode: "auto_all", text: "Haus" })).toEqual({
      ok: false,
      error: { kind: "provider_failure", text: "Haus" },
    });
  });

  it("translates even when the cache is unavailable", async () => {
    const broken: CacheBackend = {
      get: async (_key: CacheKey) => { throw new Error("disk I/O error"); },
      set: async () => { throw new Error("disk I/O error"); },
    };
    const gateway = new FakeGateway(() => FREUNDSCHAFT);

    const outcome = await setup(gateway, broken).translate({ mode: "auto_all", text: "Freundschaft" });

    expect(outcome.ok && outcome.fromCache).toBe(false);
    expect(outcome.ok && outcome.result.translations.en).toBe("friendship");
  });
});
