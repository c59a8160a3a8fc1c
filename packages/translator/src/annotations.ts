/**
 * Post-processing of provider annotations.
 *
 * Everything here is checked, never inferred: a field the provider left out
 * or got wrong is dropped on its own, and the translation goes through.
 */

import type {
  GermanArticle,
  GermanCase,
  GermanGender,
  GermanGovernance,
  GermanNounInfo,
  LanguageCode,
  LinguisticAnnotations,
  VerbPastForms,
} from "@tetraglot/shared-types";
import { SUPPORTED_LANGUAGES } from "@tetraglot/languages";
import type { ProviderAnnotations, ProviderPastForms } from "./types.js";

const ARTICLE_GENDER: Readonly<Record<GermanArticle, GermanGender>> = {
  der: "m",
  die: "f",
  das: "n",
};

const CASE_ALIASES: Readonly<Record<string, GermanCase>> = {
  akk: "Akk",
  akkusativ: "Akk",
  accusative: "Akk",
  a: "Akk",
  dat: "Dat",
  dativ: "Dat",
  dative: "Dat",
  d: "Dat",
  gen: "Gen",
  genitiv: "Gen",
  genitive: "Gen",
  g: "Gen",
};

function isGermanArticle(value: string): value is GermanArticle {
  return value === "der" || value === "die" || value === "das";
}

function isGermanGender(value: string): value is GermanGender {
  return value === "m" || value === "f" || value === "n";
}

export function normalizeGermanCase(raw: string): GermanCase | null {
  return CASE_ALIASES[raw.trim().toLowerCase().replace(/\.$/, "")] ?? null;
}

/** Article and gender must agree (der/m, die/f, das/n) */
export function checkGermanNoun(raw: ProviderAnnotations["germanNoun"]): GermanNounInfo | null {
  if (!raw) return null;
  const article = raw.article.trim().toLowerCase();
  const gender = raw.gender.trim().toLowerCase().replace(/\.$/, "");
  const lemma = raw.lemma.trim();
  if (!isGermanArticle(article) || !isGermanGender(gender) || !lemma) return null;
  if (ARTICLE_GENDER[article] !== gender) return null;
  return { article, gender, lemma };
}

export function checkGermanGovernance(raw: ProviderAnnotations["germanGovernance"]): GermanGovernance | null {
  if (!raw) return null;
  const verb = raw.verb.trim();
  const preposition = raw.preposition.trim();
  const grammaticalCase = normalizeGermanCase(raw.case);
  if (!verb || !preposition || !grammaticalCase) return null;
  return { verb, preposition, case: grammaticalCase };
}

/**
 * Key past forms for the languages in `involved`, in display order; a
 * language missing any of its forms is skipped.
 */
export function selectPastForms(raw: ProviderPastForms, involved: readonly LanguageCode[]): VerbPastForms {
  const forms: VerbPastForms = {};
  for (const lang of SUPPORTED_LANGUAGES.filter((l) => involved.includes(l))) {
    switch (lang) {
      case "ru":
        if (raw.ruPast) forms.ru = { past: raw.ruPast };
        break;
      case "en":
        if (raw.enPastSimple && raw.enPastParticiple) {
          forms.en = { pastSimple: raw.enPastSimple, pastParticiple: raw.enPastParticiple };
        }
        break;
      case "de":
        if (raw.dePerfekt && raw.dePraeteritum) {
          forms.de = { perfekt: raw.dePerfekt, praeteritum: raw.dePraeteritum };
        }
        break;
      case "hy":
        if (raw.hyPast) forms.hy = { past: raw.hyPast };
        break;
    }
  }
  return forms;
}

export interface AnnotatedTranslations {
  translations: Partial<Record<LanguageCode, string>>;
  annotations: LinguisticAnnotations;
}

/**
 * Apply provider annotations to a set of translations for `source` → `targets`.
 * Verbs get their infinitives in place of the translations and key past
 * forms; German nouns and governance only when German is involved.
 */
export function applyAnnotations(
  raw: ProviderAnnotations,
  source: LanguageCode,
  targets: readonly LanguageCode[],
  translations: Partial<Record<LanguageCode, string>>
): AnnotatedTranslations {
  const involved: LanguageCode[] = [source, ...targets.filter((t) => t !== source)];
  const germanInvolved = involved.includes("de");
  const out: Partial<Record<LanguageCode, string>> = { ...translations };
  const annotations: LinguisticAnnotations = { isVerb: raw.isVerb };

  if (raw.isVerb) {
    for (const target of targets) {
      const infinitive = raw.infinitives[target];
      if (infinitive && out[target]) out[target] = infinitive;
    }
    const pastForms = selectPastForms(raw.pastForms, involved);
    if (Object.keys(pastForms).length > 0) annotations.pastForms = pastForms;
  }

  if (germanInvolved && !raw.isVerb) {
    const noun = checkGermanNoun(raw.germanNoun);
    if (noun) annotations.germanNoun = noun;
  }

  if (germanInvolved && raw.isVerb) {
    const governance = checkGermanGovernance(raw.germanGovernance);
    if (governance) annotations.germanGovernance = governance;
  }

  return { translations: out, annotations };
}
