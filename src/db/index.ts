// pattern: Imperative Shell
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";

const MEMORY_URL = ":memory:";

/**
 * Opens the article store. Accepts a file path, a `file:` URL, or `:memory:`.
 */
export function createDatabase(
  databaseUrl: string,
): { readonly db: AppDatabase; readonly close: () => void } {
  const dbPath = databaseUrl.startsWith("file:")
    ? databaseUrl.slice("file:".length)
    : databaseUrl;

  if (dbPath !== MEMORY_URL) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");

  const db = drizzle(sqlite, { schema });

  return { db, close: () => sqlite.close() };
}

export { ensureSchema } from "./init";

export type AppDatabase = BetterSQLite3Database<typeof schema>;
