/**
 * Per-user translation history: a bounded list, newest first.
 */

import type { HistoryEntry, LanguageCode } from "@tetraglot/shared-types";
import { emptySession, type SessionStore, type UserSession } from "./session.js";

export const SNIPPET_MAX_LENGTH = 80;

/** Single line, at most 80 code points (77 + "...") */
export function makeSnippet(text: string): string {
  const flat = Array.from(text.replace(/\r?\n/g, " ").trim());
  if (flat.length <= SNIPPET_MAX_LENGTH) return flat.join("");
  return `${flat.slice(0, SNIPPET_MAX_LENGTH - 3).join("")}...`;
}

export interface HistoryOptions {
  enabled: boolean;
  limit: number;
}

export class TranslationHistory {
  constructor(
    private readonly sessions: SessionStore<UserSession>,
    private readonly options: HistoryOptions
  ) {}

  get enabled(): boolean {
    return this.options.enabled;
  }

  async record(
    userId: string,
    input: { text: string; source: LanguageCode; targets: LanguageCode[] },
    now: Date = new Date()
  ): Promise<void> {
    if (!this.options.enabled) return;
    const entry: HistoryEntry = {
      timestamp: now.toISOString(),
      inputSnippet: makeSnippet(input.text),
      source: input.source,
      targets: [...input.targets],
    };
    await this.sessions.update(userId, (current) => {
      const session = current ?? emptySession();
      return { ...session, history: [entry, ...session.history].slice(0, this.options.limit) };
    });
  }

  /** Newest first; empty when disabled */
  async list(userId: string): Promise<HistoryEntry[]> {
    if (!this.options.enabled) return [];
    const session = await this.sessions.get(userId);
    return session ? [...session.history] : [];
  }
}
