/**
 * Conversation service: what the transport talks to.
 *
 * Reads the user's active pair, parses the message, translates it, records
 * history, and keeps text whose language could not be determined so the
 * user can name it afterwards.
 */

import type {
  BidirectionalPair,
  HistoryEntry,
  LanguageCode,
  OrchestrationError,
  ParsedIntent,
  RejectionReason,
  TranslationResult,
} from "@tetraglot/shared-types";
import { canonicalizePair } from "@tetraglot/languages";
import { parse } from "@tetraglot/input-parser";
import type { TranslationHistory } from "./history.js";
import { silentLogger, type BaseLogger } from "./logger.js";
import type { TranslationOrchestrator } from "./orchestrator.js";
import { emptySession, type SessionStore, type UserSession } from "./session.js";

export type ConversationResult =
  | { kind: "rejected"; reason: RejectionReason }
  | { kind: "translated"; result: TranslationResult; fromCache: boolean; cacheKey: string }
  | { kind: "failed"; error: OrchestrationError };

export type ClarifyResult = ConversationResult | { kind: "nothing_to_clarify" };

export class ConversationService {
  constructor(
    private readonly orchestrator: TranslationOrchestrator,
    private readonly sessions: SessionStore<UserSession>,
    private readonly history: TranslationHistory,
    private readonly logger: BaseLogger = silentLogger
  ) {}

  async handleText(userId: string, text: string | null | undefined): Promise<ConversationResult> {
    const activePair = await this.getActivePair(userId);
    const parsed = parse(text, activePair);
    if (!parsed.ok) {
      this.logger.info({ event: "translation_rejected", reason: parsed.reason }, "Input rejected");
      return { kind: "rejected", reason: parsed.reason };
    }
    return this.run(userId, parsed.intent);
  }

  /** Re-run the pending text with the language the user named */
  async clarify(userId: string, language: LanguageCode): Promise<ClarifyResult> {
    const session = await this.sessions.get(userId);
    const pending = session?.pendingClarification ?? null;
    if (pending === null) return { kind: "nothing_to_clarify" };

    await this.sessions.update(userId, (current) => ({
      ...(current ?? emptySession()),
      pendingClarification: null,
    }));
    return this.run(userId, { mode: "forced_source", source: language, text: pending });
  }

  /** Null when both sides are the same language */
  async setActivePair(userId: string, a: LanguageCode, b: LanguageCode): Promise<BidirectionalPair | null> {
    const pair = canonicalizePair(a, b);
    if (!pair) return null;
    await this.sessions.update(userId, (current) => ({ ...(current ?? emptySession()), activePair: pair }));
    return pair;
  }

  async clearActivePair(userId: string): Promise<void> {
    await this.sessions.update(userId, (current) => ({ ...(current ?? emptySession()), activePair: null }));
  }

  async getActivePair(userId: string): Promise<BidirectionalPair | null> {
    const session = await this.sessions.get(userId);
    return session?.activePair ?? null;
  }

  get historyEnabled(): boolean {
    return this.history.enabled;
  }

  listHistory(userId: string): Promise<HistoryEntry[]> {
    return this.history.list(userId);
  }

  private async run(userId: string, intent: ParsedIntent): Promise<ConversationResult> {
    const outcome = await this.orchestrator.translate(intent);

    if (!outcome.ok) {
      if (outcome.error.kind === "unknown_language") {
        await this.sessions.update(userId, (current) => ({
          ...(current ?? emptySession()),
          pendingClarification: outcome.error.text,
        }));
      }
      return { kind: "failed", error: outcome.error };
    }

    const { result } = outcome;
    const translated = result.targets.filter((target) => Boolean(result.translations[target]));
    await this.history.record(userId, { text: intent.text, source: result.source, targets: translated });
    return { kind: "translated", result, fromCache: outcome.fromCache, cacheKey: outcome.cacheKey };
  }
}
