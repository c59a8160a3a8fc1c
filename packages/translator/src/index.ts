/**
 * @tetraglot/translator — Public API surface
 */
import { TranslationCache, type CacheBackend } from "./cache.js";
import { ConversationService } from "./conversation.js";
import { TranslationHistory, type HistoryOptions } from "./history.js";
import { errorClass, silentLogger, type BaseLogger } from "./logger.js";
import { TranslationOrchestrator } from "./orchestrator.js";
import { RetryingGateway, retryPolicy, type RetryHooks } from "./retry.js";
import { MemorySessionStore, type UserSession } from "./session.js";
import type { ProviderGateway } from "./types.js";

export { OpenAICompatibleClient, ProviderApiError, ProviderResponseError, DEFAULT_CONFIG, cleanJson, parseJson } from "./client.js";
export type { ProviderClientConfig, FetchFn, TokenUsage } from "./client.js";
export { withRetry, isRetryable, linearBackoff, retryPolicy, RetryingGateway, MAX_BACKOFF_MS } from "./retry.js";
export type { RetryPolicy, RetryHooks } from "./retry.js";
export { buildCacheKey, cacheKeyId, normalizeCacheText, MemoryCacheBackend, SqliteCacheBackend, TranslationCache } from "./cache.js";
export type { CacheBackend } from "./cache.js";
export { createStatements, openCacheDatabase } from "./db/client.js";
export type { CacheDatabase, CacheDatabaseHandle } from "./db/client.js";
export { applyAnnotations, checkGermanNoun, checkGermanGovernance, normalizeGermanCase, selectPastForms } from "./annotations.js";
export { TranslationOrchestrator, planRequest, resolveLanguages } from "./orchestrator.js";
export { MemorySessionStore, emptySession } from "./session.js";
export type { SessionStore, UserSession } from "./session.js";
export { TranslationHistory, makeSnippet, SNIPPET_MAX_LENGTH } from "./history.js";
export type { HistoryOptions } from "./history.js";
export { ConversationService } from "./conversation.js";
export type { ConversationResult, ClarifyResult } from "./conversation.js";
export { classifyTranslationValue, normalizeTranslationValue, normalizeTranslationMap } from "./normalize.js";
export { silentLogger } from "./logger.js";
export type { BaseLogger } from "./logger.js";
export type {
  ProviderGateway, ProviderRequest, ProviderTranslation, ProviderAnnotations,
  ProviderPastForms, RawTranslationValue, DetectedLanguage,
} from "./types.js";
export { EMPTY_ANNOTATIONS } from "./types.js";

// ─── Wiring ───────────────────────────────────────────────────────────────────

export interface ConversationServiceOptions {
  /** Single-attempt gateway; retries are layered on here */
  gateway: ProviderGateway;
  cacheBackend: CacheBackend;
  maxRetries: number;
  history: HistoryOptions;
  logger?: BaseLogger;
  sleep?: RetryHooks["sleep"];
}

export function createConversationService(options: ConversationServiceOptions): ConversationService {
  const logger = options.logger ?? silentLogger;
  const gateway = new RetryingGateway(options.gateway, retryPolicy(options.maxRetries), {
    onRetry: ({ attempt, delayMs, error }) =>
      logger.warn({ event: "provider_retry", attempt, delayMs, errorClass: errorClass(error) }, "Retrying provider call"),
    ...(options.sleep ? { sleep: options.sleep } : {}),
  });
  const sessions = new MemorySessionStore<UserSession>();
  const orchestrator = new TranslationOrchestrator(gateway, new TranslationCache(options.cacheBackend, logger), logger);
  const history = new TranslationHistory(sessions, options.history);
  return new ConversationService(orchestrator, sessions, history, logger);
}
