/**
 * SQLite connection for the translation cache (libSQL, local file).
 *
 * The tables are created on open from the Drizzle schema, so a fresh
 * deployment needs no migration step and schema.ts stays the only place the
 * table is defined. `:memory:` gives a throwaway database (tests, ephemeral
 * runs).
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { createClient } from "@libsql/client";
import { is } from "drizzle-orm";
import { drizzle, type LibSQLDatabase } from "drizzle-orm/libsql";
import { SQLiteColumn, getTableConfig, type SQLiteTable } from "drizzle-orm/sqlite-core";
import * as schema from "./schema.js";

export type CacheDatabase = LibSQLDatabase<typeof schema>;

export interface CacheDatabaseHandle {
  db: CacheDatabase;
  close: () => void;
}

const MEMORY_PATH = ":memory:";

export async function openCacheDatabase(path: string): Promise<CacheDatabaseHandle> {
  const inMemory = path === MEMORY_PATH;
  if (!inMemory) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const client = createClient({ url: inMemory ? MEMORY_PATH : `file:${path}` });
  try {
    if (!inMemory) await client.execute("PRAGMA journal_mode = WAL");
    for (const statement of createStatements(schema.translationCache)) {
      await client.execute(statement);
    }
  } catch (err) {
    client.close();
    throw err;
  }

  return {
    db: drizzle(client, { schema }),
    close: () => client.close(),
  };
}

// ─── DDL from the schema ──────────────────────────────────────────────────────

function quote(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

/** `CREATE TABLE` / `CREATE INDEX` statements for `table`, all `IF NOT EXISTS` */
export function createStatements(table: SQLiteTable): string[] {
  const { name, columns, indexes } = getTableConfig(table);

  const columnDefs = columns.map((column) => {
    const parts = [quote(column.name), column.getSQLType().toUpperCase()];
    if (column.primary) parts.push("PRIMARY KEY");
    else if (column.notNull) parts.push("NOT NULL");
    return parts.join(" ");
  });

  const statements = [`CREATE TABLE IF NOT EXISTS ${quote(name)} (${columnDefs.join(", ")})`];

  for (const index of indexes) {
    const { name: indexName, unique, columns: indexColumns } = index.config;
    const names = indexColumns.flatMap((column) => (is(column, SQLiteColumn) ? [quote(column.name)] : []));
    statements.push(
      `CREATE ${unique ? "UNIQUE " : ""}INDEX IF NOT EXISTS ${quote(indexName)} ON ${quote(name)} (${names.join(", ")})`
    );
  }

  return statements;
}
