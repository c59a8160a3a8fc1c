/**
 * Translation orchestrator.
 *
 * Turns a parsed intent into a translation outcome:
 *   1. Resolve the cache key for the mode and return a hit unchanged
 *   2. Call the provider, with detection when the source is not fixed
 *   3. Refill targets the first call left untranslated
 *   4. Apply annotations, store complete results
 *
 * Never throws: every failure becomes an OrchestrationError.
 */

import type {
  CacheKey,
  LanguageCode,
  ParsedIntent,
  TranslationOutcome,
  TranslationResult,
} from "@tetraglot/shared-types";
import { SUPPORTED_LANGUAGES, otherInPair, otherLanguages } from "@tetraglot/languages";
import { applyAnnotations } from "./annotations.js";
import { TranslationCache, buildCacheKey, cacheKeyId } from "./cache.js";
import { errorClass, silentLogger, type BaseLogger } from "./logger.js";
import type { ProviderGateway, ProviderRequest, ProviderTranslation } from "./types.js";

interface Plan {
  key: CacheKey;
  request: ProviderRequest;
}

function inDisplayOrder(langs: readonly LanguageCode[]): LanguageCode[] {
  return SUPPORTED_LANGUAGES.filter((lang) => langs.includes(lang));
}

export function planRequest(intent: ParsedIntent): Plan {
  switch (intent.mode) {
    case "explicit_pair":
      return {
        key: buildCacheKey(intent.source, [intent.target], intent.text),
        request: {
          text: intent.text,
          source: intent.source,
          targets: [intent.target],
          scope: inDisplayOrder([intent.source, intent.target]),
        },
      };
    case "forced_source": {
      const targets = otherLanguages(intent.source);
      return {
        key: buildCacheKey(intent.source, targets, intent.text),
        request: { text: intent.text, source: intent.source, targets, scope: [...SUPPORTED_LANGUAGES] },
      };
    }
    case "default_pair": {
      const pair = inDisplayOrder(intent.pair);
      return {
        key: buildCacheKey("auto", pair, intent.text),
        request: { text: intent.text, source: "auto", targets: pair, scope: pair },
      };
    }
    case "auto_all":
      return {
        key: buildCacheKey("auto", SUPPORTED_LANGUAGES, intent.text),
        request: {
          text: intent.text,
          source: "auto",
          targets: [...SUPPORTED_LANGUAGES],
          scope: [...SUPPORTED_LANGUAGES],
        },
      };
  }
}

type Resolution =
  | { ok: true; source: LanguageCode; targets: LanguageCode[] }
  | { ok: false };

/** Source and targets once the provider has answered */
export function resolveLanguages(intent: ParsedIntent, response: ProviderTranslation): Resolution {
  switch (intent.mode) {
    case "explicit_pair":
      return { ok: true, source: intent.source, targets: [intent.target] };
    case "forced_source":
      return { ok: true, source: intent.source, targets: otherLanguages(intent.source) };
    case "default_pair": {
      const detected = response.detectedLanguage;
      if (detected === "unknown" || !intent.pair.includes(detected)) return { ok: false };
      return { ok: true, source: detected, targets: [otherInPair(intent.pair, detected)] };
    }
    case "auto_all": {
      const detected = response.detectedLanguage;
      if (detected === "unknown") return { ok: false };
      return { ok: true, source: detected, targets: otherLanguages(detected) };
    }
  }
}

export class TranslationOrchestrator {
  constructor(
    private readonly gateway: ProviderGateway,
    private readonly cache: TranslationCache,
    private readonly logger: BaseLogger = silentLogger
  ) {}

  async translate(intent: ParsedIntent): Promise<TranslationOutcome> {
    const { key, request } = planRequest(intent);
    const cacheKey = cacheKeyId(key);

    const cached = await this.readCache(key);
    if (cached) {
      this.logger.info({ event: "cache_hit", mode: intent.mode, cacheKey }, "Translation served from cache");
      return { ok: true, result: cached, fromCache: true, cacheKey };
    }

    let response: ProviderTranslation;
    try {
      response = await this.gateway.translate(request);
    } catch (err) {
      return this.fail(intent, err);
    }

    const resolution = resolveLanguages(intent, response);
    if (!resolution.ok) {
      this.logger.info(
        { event: "translation_failed", kind: "unknown_language", mode: intent.mode, detected: response.detectedLanguage },
        "Source language outside the allowed set"
      );
      return { ok: false, error: { kind: "unknown_language", text: intent.text } };
    }

    const { source, targets } = resolution;
    const translations: Partial<Record<LanguageCode, string>> = {};
    for (const target of targets) {
      const value = response.translations[target];
      if (value) translations[target] = value;
    }

    const missing = targets.filter((target) => !translations[target]);
    if (missing.length > 0) {
      try {
        const refill = await this.gateway.translate({
          text: intent.text,
          source,
          targets: missing,
          scope: request.scope,
        });
        for (const target of missing) {
          const value = refill.translations[target];
          if (value) translations[target] = value;
        }
      } catch (err) {
        this.logger.warn({ event: "refill_failed", errorClass: errorClass(err), missing }, "Refill call failed");
      }
    }

    if (Object.keys(translations).length === 0) {
      return this.fail(intent, new Error("Provider returned no translations"));
    }

    const annotated = applyAnnotations(response.annotations, source, targets, translations);
    const result: TranslationResult = {
      mode: intent.mode,
      source,
      targets,
      translations: annotated.translations,
      annotations: annotated.annotations,
    };

    const complete = targets.every((target) => Boolean(result.translations[target]));
    if (complete) await this.writeCache(key, result);

    this.logger.info(
      { event: "translation_accepted", mode: intent.mode, source, targets, complete },
      "Translation accepted"
    );
    return { ok: true, result, fromCache: false, cacheKey };
  }

  private async readCache(key: CacheKey): Promise<TranslationResult | null> {
    try {
      const entry = await this.cache.get(key);
      return entry?.result ?? null;
    } catch (err) {
      this.logger.warn({ event: "cache_read_failed", errorClass: errorClass(err) }, "Cache read failed");
      return null;
    }
  }

  private async writeCache(key: CacheKey, result: TranslationResult): Promise<void> {
    try {
      await this.cache.put(key, result);
      this.logger.debug({ event: "cache_write", cacheKey: cacheKeyId(key) }, "Translation cached");
    } catch (err) {
      this.logger.warn({ event: "cache_write_failed", errorClass: errorClass(err) }, "Cache write failed");
    }
  }

  private fail(intent: ParsedIntent, err: unknown): TranslationOutcome {
    this.logger.error(
      { event: "translation_failed", kind: "provider_failure", mode: intent.mode, errorClass: errorClass(err) },
      "Provider call failed"
    );
    return { ok: false, error: { kind: "provider_failure", text: intent.text } };
  }
}
