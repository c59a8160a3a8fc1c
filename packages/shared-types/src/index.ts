export type {
  LanguageCode,
  SourceLanguage,
  DirectionalPair,
  BidirectionalPair,
  ParsedIntent,
  ParseMode,
  RejectionReason,
  ParseResult,
  GermanArticle,
  GermanGender,
  GermanCase,
  GermanNounInfo,
  GermanGovernance,
  VerbPastForms,
  LinguisticAnnotations,
  TranslationResult,
  OrchestrationErrorKind,
  OrchestrationError,
  TranslationOutcome,
  CacheKey,
  CacheEntry,
  HistoryEntry,
} from "./schema.js";
