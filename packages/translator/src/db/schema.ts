/**
 * Translation cache schema — Drizzle ORM (SQLite)
 *
 * Tables:
 *   translation_cache — one stored result per (source, target scope, normalized text)
 */

import { sqliteTable, text, integer, uniqueIndex } from "drizzle-orm/sqlite-core";

// ─── Translation cache ────────────────────────────────────────────────────────

export const translationCache = sqliteTable(
  "translation_cache",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    /** Fixed source code, or "auto" */
    source: text("source").notNull(),
    /** Sorted target codes joined by "," */
    targets: text("targets").notNull(),
    textNorm: text("text_norm").notNull(),
    /** JSON-serialized CacheEntry */
    entry: text("entry").notNull(),
    /** ISO 8601 */
    createdAt: text("created_at").notNull(),
  },
  (table) => ({
    keyIdx: uniqueIndex("translation_cache_key_idx").on(table.source, table.targets, table.textNorm),
  })
);

export type TranslationCacheRow = typeof translationCache.$inferSelect;
export type NewTranslationCacheRow = typeof translationCache.$inferInsert;
