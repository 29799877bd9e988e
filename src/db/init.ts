import { sql } from "drizzle-orm";
import type { AppDatabase } from "./index";

/**
 * Creates the articles and tasks tables when absent. Running it against an
 * initialised database changes nothing.
 */
export function ensureSchema(db: AppDatabase): void {
  db.transaction((tx) => {
    tx.run(sql`
      CREATE TABLE IF NOT EXISTS articles (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        title TEXT NOT NULL,
        summary TEXT NOT NULL,
        pub_date INTEGER NOT NULL,
        source_url TEXT NOT NULL UNIQUE,
        category TEXT NOT NULL,
        created_at INTEGER NOT NULL DEFAULT (unixepoch())
      )
    `);

    tx.run(sql`
      CREATE TABLE IF NOT EXISTS tasks (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        payload TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending',
        attempts INTEGER NOT NULL DEFAULT 0,
        run_after INTEGER NOT NULL,
        last_error TEXT,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `);

    tx.run(sql`
      CREATE INDEX IF NOT EXISTS tasks_status_run_after_idx
        ON tasks (status, run_after)
    `);
  });
}
