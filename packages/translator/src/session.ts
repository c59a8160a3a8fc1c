/**
 * Per-user session state.
 *
 * Lives for the process lifetime; a restart clears every user's active
 * pair, pending clarification and history.
 */

import type { BidirectionalPair, HistoryEntry } from "@tetraglot/shared-types";

export interface UserSession {
  activePair: BidirectionalPair | null;
  /** Text waiting for the user to name its language */
  pendingClarification: string | null;
  /** Newest first */
  history: HistoryEntry[];
}

export function emptySession(): UserSession {
  return { activePair: null, pendingClarification: null, history: [] };
}

export interface SessionStore<T> {
  get(userId: string): Promise<T | null>;
  set(userId: string, value: T): Promise<void>;
  evict(userId: string): Promise<void>;
  /** Read-modify-write in one step; `fn` receives null for an unknown user */
  update(userId: string, fn: (current: T | null) => T): Promise<T>;
}

export class MemorySessionStore<T> implements SessionStore<T> {
  private store = new Map<string, T>();

  async get(userId: string): Promise<T | null> {
    return this.store.get(userId) ?? null;
  }

  async set(userId: string, value: T): Promise<void> {
    this.store.set(userId, value);
  }

  async evict(userId: string): Promise<void> {
    this.store.delete(userId);
  }

  async update(userId: string, fn: (current: T | null) => T): Promise<T> {
    const next = fn(this.store.get(userId) ?? null);
    this.store.set(userId, next);
    return next;
  }

  get size(): number { return this.store.size; }
}
