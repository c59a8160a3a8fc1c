/**
 * @tetraglot/languages — Language Registry
 *
 * Canonical codes, display labels, alias resolution across Latin, Cyrillic
 * and Armenian spellings, and pair canonicalization. Pure lookups: the alias
 * table is read once when the module loads.
 */
import { readFileSync } from "node:fs";
import { z } from "zod";
import type { LanguageCode, BidirectionalPair, DirectionalPair } from "@tetraglot/shared-types";

// ─── Supported set ───────────────────────────────────────────────────────────

/** Fixed display order used everywhere a list of languages is shown */
export const SUPPORTED_LANGUAGES: readonly LanguageCode[] = ["ru", "en", "de", "hy"];

export const LANGUAGE_LABELS: Readonly<Record<LanguageCode, string>> = {
  ru: "Русский",
  en: "English",
  de: "Deutsch",
  hy: "Հայերեն",
};

export function isSupportedLanguage(value: unknown): value is LanguageCode {
  return typeof value === "string" && (SUPPORTED_LANGUAGES as readonly string[]).includes(value);
}

export function languageLabel(code: LanguageCode): string {
  return LANGUAGE_LABELS[code];
}

/** The three languages other than `code`, in display order */
export function otherLanguages(code: LanguageCode): LanguageCode[] {
  return SUPPORTED_LANGUAGES.filter((lang) => lang !== code);
}

// ─── Alias table ─────────────────────────────────────────────────────────────

const AliasFileSchema = z.object({
  ru: z.array(z.string().min(1)),
  en: z.array(z.string().min(1)),
  de: z.array(z.string().min(1)),
  hy: z.array(z.string().min(1)),
});

function loadAliases(): ReadonlyMap<string, LanguageCode> {
  // data/ sits beside src/
  const raw = readFileSync(new URL("../data/aliases.json", import.meta.url), "utf8");
  const file = AliasFileSchema.parse(JSON.parse(raw));

  const table = new Map<string, LanguageCode>();
  for (const code of SUPPORTED_LANGUAGES) {
    for (const alias of file[code]) {
      const key = cleanLanguageToken(alias);
      const existing = table.get(key);
      if (existing && existing !== code) {
        throw new Error(`Alias "${alias}" maps to both ${existing} and ${code}`);
      }
      table.set(key, code);
    }
  }
  return table;
}

/**
 * Lowercase, fold ё to е, and drop everything that is not a Latin letter or
 * digit, a Cyrillic letter or an Armenian letter.
 */
export function cleanLanguageToken(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/ё/g, "е")
    .replace(/[^0-9a-zа-яա-ֆ]+/g, "");
}

const ALIASES = loadAliases();

// ─── Resolution ──────────────────────────────────────────────────────────────

/**
 * Resolve a user-typed language token to its canonical code.
 * Returns null for anything unrecognized; never throws.
 */
export function normalizeLanguage(raw: string | null | undefined): LanguageCode | null {
  if (raw == null) return null;
  const cleaned = cleanLanguageToken(raw);
  if (!cleaned) return null;
  return ALIASES.get(cleaned) ?? null;
}

const PAIR_PATTERN = /^(.+?)\s*(?:-|_|→|\s)\s*(.+?)$/u;

/**
 * Parse a directional pair such as `ru-en`, `ru_en`, `ru→en`, `ru en` or
 * `русский-английский`. Both sides must resolve and differ.
 */
export function normalizePair(raw: string | null | undefined): DirectionalPair | null {
  if (raw == null) return null;
  const text = raw.trim();
  if (!text) return null;

  const match = PAIR_PATTERN.exec(text);
  if (!match) return null;

  const source = normalizeLanguage(match[1]);
  const target = normalizeLanguage(match[2]);
  if (!source || !target || source === target) return null;
  return [source, target];
}

/**
 * Order-independent identity for an active pair: codes sorted
 * lexicographically. Null when both sides are the same language.
 */
export function canonicalizePair(a: LanguageCode, b: LanguageCode): BidirectionalPair | null {
  if (a === b) return null;
  return a < b ? [a, b] : [b, a];
}

/** The member of `pair` that is not `code` */
export function otherInPair(pair: BidirectionalPair, code: LanguageCode): LanguageCode {
  return pair[0] === code ? pair[1] : pair[0];
}
