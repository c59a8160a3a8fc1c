/**
 * Response-shape normalization at the provider boundary.
 *
 * Models may answer a target with one string or with a list of candidate
 * strings. Both are classified into a RawTranslationValue and collapsed into
 * one canonical string here, so nothing downstream branches on shape.
 */
import type { LanguageCode } from "@tetraglot/shared-types";
import { SUPPORTED_LANGUAGES } from "@tetraglot/languages";
import type { RawTranslationValue } from "./types.js";

export function classifyTranslationValue(value: unknown): RawTranslationValue {
  if (typeof value === "string") return { kind: "single", text: value };
  if (Array.isArray(value)) {
    return { kind: "candidates", items: value.filter((item): item is string => typeof item === "string") };
  }
  return { kind: "missing" };
}

/** Candidates are trimmed, de-duplicated and joined with ", " */
export function normalizeTranslationValue(value: RawTranslationValue): string {
  switch (value.kind) {
    case "single":
      return value.text.trim();
    case "candidates": {
      const seen = new Set<string>();
      for (const item of value.items) {
        const trimmed = item.trim();
        if (trimmed) seen.add(trimmed);
      }
      return [...seen].join(", ");
    }
    case "missing":
      return "";
  }
}

/**
 * Keep only `wanted` languages that carry a non-empty value, each collapsed
 * to its canonical string.
 */
export function normalizeTranslationMap(
  raw: Record<string, unknown>,
  wanted: readonly LanguageCode[] = SUPPORTED_LANGUAGES
): Partial<Record<LanguageCode, string>> {
  const result: Partial<Record<LanguageCode, string>> = {};
  for (const lang of wanted) {
    const value = normalizeTranslationValue(classifyTranslationValue(raw[lang]));
    if (value) result[lang] = value;
  }
  return result;
}
