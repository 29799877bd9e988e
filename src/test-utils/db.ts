import pino from "pino";
import { createDatabase, ensureSchema } from "../db";
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import { articles } from "../db/schema";

/**
 * Creates an in-memory SQLite test database with the schema in place.
 * @returns A new AppDatabase instance.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  ensureSchema(db);
  return db;
}

/**
 * Seeds a stored article with optional field overrides.
 * @returns The ID of the inserted article.
 */
export function seedTestArticle(
  db: AppDatabase,
  overrides?: Partial<typeof articles.$inferInsert>,
): number {
  const result = db
    .insert(articles)
    .values({
      title: "Test Article",
      summary: "A test summary",
      pubDate: new Date("2024-01-01T10:00:00Z"),
      sourceUrl: `https://example.com/article-${Date.now()}-${Math.random()}`,
      category: "Other",
      ...overrides,
    })
    .returning({ id: articles.id })
    .get();

  return result.id;
}

/**
 * Creates a default AppConfig suitable for testing.
 */
export function createTestConfig(): AppConfig {
  return {
    feeds: [
      { name: "Example Feed", url: "https://example.com/rss", enabled: true },
    ],
    classifier: {
      kind: "rules",
      defaultCategory: "Other",
      rules: [
        { category: "Terrorism", roots: ["terror"] },
        { category: "NaturalDisasters", roots: ["earthquake"] },
      ],
    },
    fetch: { timeoutMs: 15000, userAgent: "news-ingest-test/1.0" },
    queue: {
      maxAttempts: 3,
      retryDelaySeconds: 10,
      concurrency: 2,
      pollIntervalMs: 1000,
      batchSize: 20,
      leaseSeconds: 300,
    },
    schedule: {},
  };
}

export function createSilentLogger(): pino.Logger {
  return pino({ level: "silent" });
}
