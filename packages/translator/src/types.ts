/**
 * @tetraglot/translator — Type definitions
 *
 * The provider boundary: what the orchestrator asks for and the canonical
 * shape every provider response is normalized into before it leaves the
 * gateway.
 */
import type { LanguageCode, SourceLanguage } from "@tetraglot/shared-types";

// ─── Provider request ────────────────────────────────────────────────────────

export interface ProviderRequest {
  text: string;
  /** Fixed source, or "auto" to let the model detect it */
  source: SourceLanguage;
  /** Languages a translation is wanted for */
  targets: LanguageCode[];
  /** Languages the detected source must belong to */
  scope: LanguageCode[];
}

// ─── Raw response values (before normalization) ──────────────────────────────

/**
 * A per-language value as the model returned it: one string, a list of
 * candidate strings, or nothing usable.
 */
export type RawTranslationValue =
  | { kind: "single"; text: string }
  | { kind: "candidates"; items: string[] }
  | { kind: "missing" };

// ─── Canonical response ──────────────────────────────────────────────────────

export type DetectedLanguage = LanguageCode | "unknown";

export interface ProviderPastForms {
  ruPast?: string;
  enPastSimple?: string;
  enPastParticiple?: string;
  dePerfekt?: string;
  dePraeteritum?: string;
  hyPast?: string;
}

/** Annotation fields as returned by the provider; checked by the orchestrator */
export interface ProviderAnnotations {
  isVerb: boolean;
  infinitives: Partial<Record<LanguageCode, string>>;
  pastForms: ProviderPastForms;
  germanNoun: { article: string; gender: string; lemma: string } | null;
  germanGovernance: { verb: string; preposition: string; case: string } | null;
}

export interface ProviderTranslation {
  detectedLanguage: DetectedLanguage;
  /** One canonical string per requested target that came back non-empty */
  translations: Partial<Record<LanguageCode, string>>;
  annotations: ProviderAnnotations;
}

/** Single-attempt call to the translation provider */
export interface ProviderGateway {
  translate(request: ProviderRequest): Promise<ProviderTranslation>;
}

export const EMPTY_ANNOTATIONS: ProviderAnnotations = {
  isVerb: false,
  infinitives: {},
  pastForms: {},
  germanNoun: null,
  germanGovernance: null,
};
