import { describe, it, expect } from "vitest";
import { createTestDatabase } from "../test-utils/db";
import { articles } from "../db/schema";
import { createDatabase } from "../db";
import { createArticleStore, isSourceUrlConflict } from "./store";
import type { NewArticle } from "./types";

function article(overrides: Partial<NewArticle> = {}): NewArticle {
  return {
    title: "Quake hits region",
    summary: "A major earthquake struck today",
    pubDate: new Date("2024-01-01T10:00:00Z"),
    sourceUrl: "http://example.com/a1",
    category: "NaturalDisasters",
    ...overrides,
  };
}

describe("createArticleStore", () => {
  it("should insert an article and return its id", () => {
    const db = createTestDatabase();
    const store = createArticleStore(db);

    const result = store.insert(article());

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.id).toBeGreaterThan(0);
    }

    const rows = db.select().from(articles).all();
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      title: "Quake hits region",
      summary: "A major earthquake struck today",
      sourceUrl: "http://example.com/a1",
      category: "NaturalDisasters",
    });
    expect(rows[0]?.pubDate).toEqual(new Date("2024-01-01T10:00:00Z"));
  });

  it("should report a duplicate source URL without storing a second row", () => {
    const db = createTestDatabase();
    const store = createArticleStore(db);

    store.insert(article());
    const second = store.insert(article({ title: "Same link, new title" }));

    expect(second).toEqual({ ok: false, error: { kind: "duplicate" } });
    expect(store.count()).toBe(1);
    expect(store.findBySourceUrl("http://example.com/a1")?.title).toBe(
      "Quake hits region",
    );
  });

  it("should store distinct source URLs independently", () => {
    const db = createTestDatabase();
    const store = createArticleStore(db);

    store.insert(article({ sourceUrl: "http://example.com/a1" }));
    store.insert(article({ sourceUrl: "http://example.com/a2" }));
    store.insert(article({ sourceUrl: "http://example.com/a1" }));

    const urls = db
      .select({ sourceUrl: articles.sourceUrl })
      .from(articles)
      .all()
      .map((row) => row.sourceUrl);
    expect(urls).toEqual(["http://example.com/a1", "http://example.com/a2"]);
  });

  it("should report other failures as fatal", () => {
    const { db } = createDatabase(":memory:");
    const store = createArticleStore(db);

    const result = store.insert(article());

    expect(result.ok).toBe(false);
    if (!result.ok && result.error.kind === "fatal") {
      expect(result.error.message).toContain("no such table");
    } else {
      expect.unreachable("expected a fatal store error");
    }
  });

  it("should return undefined for an unknown source URL", () => {
    const store = createArticleStore(createTestDatabase());
    expect(store.findBySourceUrl("http://example.com/missing")).toBeUndefined();
  });
});

describe("isSourceUrlConflict", () => {
  it("should recognise the driver error directly", () => {
    const err = Object.assign(
      new Error("UNIQUE constraint failed: articles.source_url"),
      { code: "SQLITE_CONSTRAINT_UNIQUE" },
    );
    expect(isSourceUrlConflict(err)).toBe(true);
  });

  it("should recognise the driver error behind a wrapping error", () => {
    const cause = Object.assign(
      new Error("UNIQUE constraint failed: articles.source_url"),
      { code: "SQLITE_CONSTRAINT_UNIQUE" },
    );
    const wrapped = new Error("Failed query: insert into articles", { cause });
    expect(isSourceUrlConflict(wrapped)).toBe(true);
  });

  it("should not treat other constraint failures as duplicates", () => {
    const err = Object.assign(
      new Error("NOT NULL constraint failed: articles.title"),
      { code: "SQLITE_CONSTRAINT_NOTNULL" },
    );
    expect(isSourceUrlConflict(err)).toBe(false);
    expect(isSourceUrlConflict("not an error")).toBe(false);
  });
});
