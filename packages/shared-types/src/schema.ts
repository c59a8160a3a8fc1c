/**
 * Tetraglot domain schema
 *
 * Shared by the registry, the parser, the translator and the transport.
 * Everything here is plain data: no behaviour, no I/O.
 */

// ─── Languages ───────────────────────────────────────────────────────────────

/** Canonical tags of the four supported languages */
export type LanguageCode = "ru" | "en" | "de" | "hy";

/** Source language as sent to the provider: fixed, or left to detection */
export type SourceLanguage = LanguageCode | "auto";

/** Ordered A→B pair; A !== B */
export type DirectionalPair = readonly [source: LanguageCode, target: LanguageCode];

/**
 * Unordered {A, B} pair in canonical (sorted) order, so that "en,de" and
 * "de,en" are the same value.
 */
export type BidirectionalPair = readonly [first: LanguageCode, second: LanguageCode];

// ─── Parser output ───────────────────────────────────────────────────────────

export type ParsedIntent =
  | { mode: "explicit_pair"; source: LanguageCode; target: LanguageCode; text: string }
  | { mode: "forced_source"; source: LanguageCode; text: string }
  | { mode: "default_pair"; pair: BidirectionalPair; text: string }
  | { mode: "auto_all"; text: string };

export type ParseMode = ParsedIntent["mode"];

export type RejectionReason = "empty" | "too_long" | "invalid_pair_format";

export type ParseResult =
  | { ok: true; intent: ParsedIntent }
  | { ok: false; reason: RejectionReason };

// ─── Linguistic annotations ──────────────────────────────────────────────────

export type GermanArticle = "der" | "die" | "das";
export type GermanGender = "m" | "f" | "n";
export type GermanCase = "Akk" | "Dat" | "Gen";

export interface GermanNounInfo {
  article: GermanArticle;
  gender: GermanGender;
  /** Noun in nominative singular, e.g. "Pappe" */
  lemma: string;
}

export interface GermanGovernance {
  /** Infinitive, e.g. "teilnehmen" */
  verb: string;
  preposition: string;
  case: GermanCase;
}

/** Key past-tense forms, only for the languages involved in the request */
export interface VerbPastForms {
  ru?: { past: string };
  en?: { pastSimple: string; pastParticiple: string };
  de?: { perfekt: string; praeteritum: string };
  hy?: { past: string };
}

export interface LinguisticAnnotations {
  /** Set when the source text is a verb; translations are then infinitives */
  isVerb: boolean;
  pastForms?: VerbPastForms;
  germanNoun?: GermanNounInfo;
  germanGovernance?: GermanGovernance;
}

// ─── Translator output ───────────────────────────────────────────────────────

export interface TranslationResult {
  mode: ParseMode;
  /** Resolved source (detected or fixed) */
  source: LanguageCode;
  /** Resolved targets in display order */
  targets: LanguageCode[];
  /** Per-target canonical translation; only translated targets are present */
  translations: Partial<Record<LanguageCode, string>>;
  annotations: LinguisticAnnotations;
}

export type OrchestrationErrorKind = "provider_failure" | "unknown_language";

export interface OrchestrationError {
  kind: OrchestrationErrorKind;
  /** The payload text, so the caller can ask for clarification */
  text: string;
}

export type TranslationOutcome =
  | { ok: true; result: TranslationResult; fromCache: boolean; cacheKey: string }
  | { ok: false; error: OrchestrationError };

// ─── Cache ───────────────────────────────────────────────────────────────────

export interface CacheKey {
  source: SourceLanguage;
  /** De-duplicated, sorted target scope */
  targets: LanguageCode[];
  /** Trimmed, whitespace-collapsed, case-folded text */
  text: string;
}

export interface CacheEntry {
  result: TranslationResult;
  /** ISO 8601 */
  insertedAt: string;
}

// ─── History ─────────────────────────────────────────────────────────────────

export interface HistoryEntry {
  /** ISO 8601 */
  timestamp: string;
  /** Input, single-line, at most 80 characters */
  inputSnippet: string;
  source: LanguageCode;
  targets: LanguageCode[];
}
