/**
 * Translation result cache.
 *
 * Key: (source or "auto", sorted target scope, normalized text).
 * Keys are permanent; there is no TTL and no invalidation path.
 *
 * Backends are injectable: SQLite (durable) in production, in-memory for
 * tests. The manager owns serialization and validates every row it reads.
 */

import { and, eq } from "drizzle-orm";
import { z } from "zod";
import type { CacheEntry, CacheKey, LanguageCode, SourceLanguage, TranslationResult } from "@tetraglot/shared-types";
import { SUPPORTED_LANGUAGES } from "@tetraglot/languages";
import type { CacheDatabase } from "./db/client.js";
import { translationCache } from "./db/schema.js";
import { silentLogger, type BaseLogger } from "./logger.js";

// ─── Keys ─────────────────────────────────────────────────────────────────────

export function normalizeCacheText(text: string, source: SourceLanguage): string {
  const collapsed = text.trim().replace(/\s+/gu, " ");
  return source === "auto" ? collapsed.toLowerCase() : collapsed.toLocaleLowerCase(source);
}

export function buildCacheKey(
  source: SourceLanguage,
  targets: readonly LanguageCode[],
  text: string
): CacheKey {
  return {
    source,
    targets: [...new Set(targets)].sort(),
    text: normalizeCacheText(text, source),
  };
}

/** Stable string form of a key, e.g. `auto:de,en:vater` */
export function cacheKeyId(key: CacheKey): string {
  return `${key.source}:${key.targets.join(",")}:${key.text}`;
}

// ─── Backend interface ────────────────────────────────────────────────────────

export interface CacheBackend {
  get(key: CacheKey): Promise<string | null>;
  /** Insert or replace; last writer wins */
  set(key: CacheKey, value: string, createdAt: string): Promise<void>;
}

// ─── In-memory backend ────────────────────────────────────────────────────────

export class MemoryCacheBackend implements CacheBackend {
  private store = new Map<string, string>();

  async get(key: CacheKey): Promise<string | null> {
    return this.store.get(cacheKeyId(key)) ?? null;
  }

  async set(key: CacheKey, value: string): Promise<void> {
    this.store.set(cacheKeyId(key), value);
  }

  /** Test helper — peek at cache size */
  get size(): number { return this.store.size; }
  clear(): void { this.store.clear(); }
}

// ─── SQLite backend ───────────────────────────────────────────────────────────

export class SqliteCacheBackend implements CacheBackend {
  constructor(private readonly db: CacheDatabase) {}

  async get(key: CacheKey): Promise<string | null> {
    const row = await this.db
      .select({ entry: translationCache.entry })
      .from(translationCache)
      .where(
        and(
          eq(translationCache.source, key.source),
          eq(translationCache.targets, key.targets.join(",")),
          eq(translationCache.textNorm, key.text)
        )
      )
      .get();
    return row?.entry ?? null;
  }

  async set(key: CacheKey, value: string, createdAt: string): Promise<void> {
    await this.db
      .insert(translationCache)
      .values({
        source: key.source,
        targets: key.targets.join(","),
        textNorm: key.text,
        entry: value,
        createdAt,
      })
      .onConflictDoUpdate({
        target: [translationCache.source, translationCache.targets, translationCache.textNorm],
        set: { entry: value, createdAt },
      })
      .run();
  }
}

// ─── Entry schema ─────────────────────────────────────────────────────────────

const LanguageCodeSchema = z.enum(["ru", "en", "de", "hy"]);
const nonEmpty = z.string().min(1);

const TranslationResultSchema = z.object({
  mode: z.enum(["explicit_pair", "forced_source", "default_pair", "auto_all"]),
  source: LanguageCodeSchema,
  targets: z.array(LanguageCodeSchema),
  translations: z.object({
    ru: nonEmpty.optional(),
    en: nonEmpty.optional(),
    de: nonEmpty.optional(),
    hy: nonEmpty.optional(),
  }),
  annotations: z.object({
    isVerb: z.boolean(),
    pastForms: z
      .object({
        ru: z.object({ past: nonEmpty }).optional(),
        en: z.object({ pastSimple: nonEmpty, pastParticiple: nonEmpty }).optional(),
        de: z.object({ perfekt: nonEmpty, praeteritum: nonEmpty }).optional(),
        hy: z.object({ past: nonEmpty }).optional(),
      })
      .optional(),
    germanNoun: z
      .object({
        article: z.enum(["der", "die", "das"]),
        gender: z.enum(["m", "f", "n"]),
        lemma: nonEmpty,
      })
      .optional(),
    germanGovernance: z
      .object({
        verb: nonEmpty,
        preposition: nonEmpty,
        case: z.enum(["Akk", "Dat", "Gen"]),
      })
      .optional(),
  }),
});

const CacheEntrySchema = z.object({
  result: TranslationResultSchema,
  insertedAt: z.string(),
});

// zod's inferred optionals carry `| undefined`; rebuild the exact shape
function toTranslationResult(parsed: z.infer<typeof TranslationResultSchema>): TranslationResult {
  const translations: Partial<Record<LanguageCode, string>> = {};
  for (const lang of SUPPORTED_LANGUAGES) {
    const value = parsed.translations[lang];
    if (value !== undefined) translations[lang] = value;
  }
  const { isVerb, pastForms, germanNoun, germanGovernance } = parsed.annotations;
  return {
    mode: parsed.mode,
    source: parsed.source,
    targets: parsed.targets,
    translations,
    annotations: {
      isVerb,
      ...(pastForms
        ? {
            pastForms: {
              ...(pastForms.ru ? { ru: pastForms.ru } : {}),
              ...(pastForms.en ? { en: pastForms.en } : {}),
              ...(pastForms.de ? { de: pastForms.de } : {}),
              ...(pastForms.hy ? { hy: pastForms.hy } : {}),
            },
          }
        : {}),
      ...(germanNoun ? { germanNoun } : {}),
      ...(germanGovernance ? { germanGovernance } : {}),
    },
  };
}

// ─── Cache manager ────────────────────────────────────────────────────────────

export class TranslationCache {
  constructor(
    private readonly backend: CacheBackend,
    private readonly logger: BaseLogger = silentLogger
  ) {}

  /** Stored result for `key`, or null on a miss or an unreadable row */
  async get(key: CacheKey): Promise<CacheEntry | null> {
    const raw = await this.backend.get(key);
    if (raw === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.logger.warn({ event: "cache_corrupt", key: cacheKeyId(key) }, "Cache entry is not valid JSON");
      return null;
    }

    const parsed = CacheEntrySchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn({ event: "cache_corrupt", key: cacheKeyId(key) }, "Cache entry failed validation");
      return null;
    }
    return { result: toTranslationResult(parsed.data.result), insertedAt: parsed.data.insertedAt };
  }

  async put(key: CacheKey, result: TranslationResult, now: Date = new Date()): Promise<CacheEntry> {
    const entry: CacheEntry = { result, insertedAt: now.toISOString() };
    await this.backend.set(key, JSON.stringify(entry), entry.insertedAt);
    return entry;
  }
}
