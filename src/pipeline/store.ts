import { count, eq } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { articles } from "../db/schema";
import type { ArticleRow } from "../db/schema";
import type { NewArticle, StoreResult } from "./types";

export type ArticleStore = {
  readonly insert: (article: NewArticle) => StoreResult;
  readonly findBySourceUrl: (sourceUrl: string) => ArticleRow | undefined;
  readonly count: () => number;
};

const UNIQUE_VIOLATION = "SQLITE_CONSTRAINT_UNIQUE";

/**
 * True when `err`, or any error in its `cause` chain, is SQLite rejecting a
 * second row for the same source_url. Drizzle may wrap the driver error.
 */
export function isSourceUrlConflict(err: unknown): boolean {
  let current: unknown = err;
  while (current instanceof Error) {
    if (
      "code" in current &&
      current.code === UNIQUE_VIOLATION &&
      current.message.includes("articles.source_url")
    ) {
      return true;
    }
    current = current.cause;
  }
  return false;
}

/**
 * Article persistence over an explicitly owned database handle.
 *
 * Each insert runs in its own transaction; a failed insert is rolled back before
 * the result is returned. The unique index on source_url is the only thing
 * arbitrating concurrent writers of the same article.
 */
export function createArticleStore(db: AppDatabase): ArticleStore {
  return {
    insert: (article) => {
      try {
        const row = db.transaction((tx) =>
          tx
            .insert(articles)
            .values({
              title: article.title,
              summary: article.summary,
              pubDate: article.pubDate,
              sourceUrl: article.sourceUrl,
              category: article.category,
            })
            .returning({ id: articles.id })
            .get(),
        );
        return { ok: true, id: row.id };
      } catch (err) {
        if (isSourceUrlConflict(err)) {
          return { ok: false, error: { kind: "duplicate" } };
        }
        const message = err instanceof Error ? err.message : String(err);
        return { ok: false, error: { kind: "fatal", message } };
      }
    },

    findBySourceUrl: (sourceUrl) =>
      db.select().from(articles).where(eq(articles.sourceUrl, sourceUrl)).get(),

    count: () => {
      const row = db.select({ total: count() }).from(articles).get();
      return row?.total ?? 0;
    },
  };
}
