/**
 * Prompt and response contract for the translate call.
 *
 * The model answers one JSON object: the detected source language, a
 * translation per requested target, and optional linguistic annotations
 * (infinitives and past forms for verbs, article and gender for German
 * nouns, prepositional governance for German verbs).
 */
import { z } from "zod";
import type { LanguageCode } from "@tetraglot/shared-types";
import { normalizeTranslationMap } from "../normalize.js";
import type { ProviderRequest, ProviderTranslation, ProviderAnnotations } from "../types.js";

export const SYSTEM_PROMPT = `You are a translation engine for ru, en, de, hy.
Return only strict JSON with the keys detected_language, translations and annotations.
Do not include markdown. Do not include extra keys.

detected_language must be one of ru, en, de, hy, unknown, and must be one of the allowed_languages when it is not unknown.
If forced_source is set, treat the input as that language and report it as detected_language.
translations maps each requested target code to a string. For single words you may return a list of up to 3 common variants, only when they are genuinely common.
Translate directly, without stylistic rewriting.

annotations:
- is_verb: true when the input is a verb in any form, including inflected or past forms.
- infinitives: when is_verb is true, the infinitive (base form) of the verb for every requested target.
- past_forms: when is_verb is true, key past forms: ru_past, en_past_simple, en_past_participle, de_perfekt, de_prateritum, hy_past.
- de_noun: when the German side is a noun, {"article": "der"|"die"|"das", "gender": "m"|"f"|"n", "lemma": nominative singular}; otherwise null.
- de_governance: when the German side is a verb that governs a preposition, {"verb": infinitive, "preposition": "...", "case": "Akk"|"Dat"|"Gen"}; otherwise null.`;

export function buildUserMessage(req: ProviderRequest): string {
  const payload = {
    input_text: req.text,
    allowed_languages: req.scope,
    requested_targets: req.targets,
    forced_source: req.source === "auto" ? null : req.source,
    requirements: {
      translation_style: "direct",
      max_variants_for_single_words: 3,
      empty_translation_for_missing: false,
    },
  };
  return `Return valid JSON for this request: ${JSON.stringify(payload)}`;
}

// ─── Response schema ─────────────────────────────────────────────────────────

const optionalText = z.string().trim().min(1).optional().catch(undefined);

// Each annotation field falls back on its own, so one malformed field never
// costs the translations
const AnnotationsSchema = z.object({
  is_verb: z.boolean().optional().catch(undefined),
  infinitives: z.record(z.string(), z.unknown()).optional().catch(undefined),
  past_forms: z
    .object({
      ru_past: optionalText,
      en_past_simple: optionalText,
      en_past_participle: optionalText,
      de_perfekt: optionalText,
      de_prateritum: optionalText,
      hy_past: optionalText,
    })
    .optional()
    .catch(undefined),
  de_noun: z
    .object({ article: z.string(), gender: z.string(), lemma: z.string() })
    .nullable()
    .optional()
    .catch(undefined),
  de_governance: z
    .object({ verb: z.string(), preposition: z.string(), case: z.string() })
    .nullable()
    .optional()
    .catch(undefined),
});

export const TranslateResponseSchema = z.object({
  detected_language: z.enum(["ru", "en", "de", "hy", "unknown"]),
  translations: z.record(z.string(), z.unknown()),
  annotations: AnnotationsSchema.nullable().optional().catch(undefined),
});

export type TranslateResponse = z.infer<typeof TranslateResponseSchema>;

/**
 * Validate the model's JSON and collapse it into the canonical provider shape.
 * Throws on a missing or malformed core field; annotation problems only drop
 * the affected field.
 */
export function parseResponse(json: unknown, req: ProviderRequest): ProviderTranslation {
  const parsed = TranslateResponseSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Response failed schema validation at ${issue?.path.join(".") || "<root>"}: ${issue?.message ?? "unknown"}`);
  }

  const { detected_language, translations, annotations } = parsed.data;
  return {
    detectedLanguage: detected_language,
    translations: normalizeTranslationMap(translations, req.targets),
    annotations: toAnnotations(annotations ?? undefined),
  };
}

function toAnnotations(raw: z.infer<typeof AnnotationsSchema> | undefined): ProviderAnnotations {
  const infinitives: Partial<Record<LanguageCode, string>> = raw?.infinitives
    ? normalizeTranslationMap(raw.infinitives)
    : {};
  const past = raw?.past_forms;

  return {
    isVerb: raw?.is_verb ?? false,
    infinitives,
    pastForms: {
      ...(past?.ru_past ? { ruPast: past.ru_past } : {}),
      ...(past?.en_past_simple ? { enPastSimple: past.en_past_simple } : {}),
      ...(past?.en_past_participle ? { enPastParticiple: past.en_past_participle } : {}),
      ...(past?.de_perfekt ? { dePerfekt: past.de_perfekt } : {}),
      ...(past?.de_prateritum ? { dePraeteritum: past.de_prateritum } : {}),
      ...(past?.hy_past ? { hyPast: past.hy_past } : {}),
    },
    germanNoun: raw?.de_noun ?? null,
    germanGovernance: raw?.de_governance ?? null,
  };
}
