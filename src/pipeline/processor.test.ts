import { describe, it, expect, vi } from "vitest";
import { createLogger } from "../logger";
import { createSilentLogger, createTestDatabase } from "../test-utils/db";
import { createRuleClassifier } from "../classifier";
import type { Classifier } from "../classifier";
import { createArticleStore } from "./store";
import type { ArticleStore } from "./store";
import { createArticleTaskHandler, processArticle } from "./processor";
import type { ArticleInput } from "./types";

const logger = createSilentLogger();

const classifier = createRuleClassifier({
  defaultCategory: "Other",
  rules: [
    { category: "Terrorism", roots: ["terror"] },
    { category: "NaturalDisasters", roots: ["earthquake"] },
  ],
});

const input: ArticleInput = {
  title: "Quake hits region",
  summary: "A major earthquake struck today",
  pubDate: "Mon, 01 Jan 2024 10:00:00 GMT",
  sourceUrl: "http://example.com/a1",
};

function fakeStore(insert: ArticleStore["insert"]): ArticleStore {
  return { insert, findBySourceUrl: () => undefined, count: () => 0 };
}

describe("processArticle", () => {
  it("should classify and store a new article", async () => {
    const store = createArticleStore(createTestDatabase());

    const outcome = await processArticle(input, { store, classifier, logger });

    expect(outcome).toEqual({
      status: "succeeded",
      articleId: 1,
      category: "NaturalDisasters",
    });
    const stored = store.findBySourceUrl("http://example.com/a1");
    expect(stored?.category).toBe("NaturalDisasters");
    expect(stored?.pubDate).toEqual(new Date("2024-01-01T10:00:00Z"));
  });

  it("should store the article when the log file cannot be written", async () => {
    const store = createArticleStore(createTestDatabase());
    const onSinkError = vi.fn();
    const failingLogger = createLogger({ level: "info", file: "/dev/full", onSinkError });

    const outcome = await processArticle(input, {
      store,
      classifier,
      logger: failingLogger,
    });

    expect(outcome).toEqual({
      status: "succeeded",
      articleId: 1,
      category: "NaturalDisasters",
    });
    expect(store.count()).toBe(1);
    await vi.waitFor(() => expect(onSinkError).toHaveBeenCalled());
  });

  it("should skip an article whose source URL is already stored", async () => {
    const store = createArticleStore(createTestDatabase());

    await processArticle(input, { store, classifier, logger });
    const outcome = await processArticle(input, { store, classifier, logger });

    expect(outcome).toEqual({ status: "skipped", reason: "duplicate" });
    expect(store.count()).toBe(1);
  });

  it("should fail permanently on a malformed date without classifying or storing", async () => {
    const classify = vi.fn<Classifier["classify"]>();
    const insert = vi.fn<ArticleStore["insert"]>();

    const outcome = await processArticle(
      { ...input, pubDate: "No publication date available" },
      { store: fakeStore(insert), classifier: { classify }, logger },
    );

    expect(outcome.status).toBe("permanent_failure");
    expect(classify).not.toHaveBeenCalled();
    expect(insert).not.toHaveBeenCalled();
  });

  it("should report a fatal store error as transient", async () => {
    const insert = vi.fn<ArticleStore["insert"]>().mockReturnValue({
      ok: false,
      error: { kind: "fatal", message: "database is locked" },
    });

    const outcome = await processArticle(input, {
      store: fakeStore(insert),
      classifier,
      logger,
    });

    expect(outcome).toEqual({
      status: "transient_failure",
      error: "database is locked",
    });
  });

  it("should report a classifier exception as transient", async () => {
    const insert = vi.fn<ArticleStore["insert"]>();
    const failing: Classifier = {
      classify: () => Promise.reject(new Error("model unavailable")),
    };

    const outcome = await processArticle(input, {
      store: fakeStore(insert),
      classifier: failing,
      logger,
    });

    expect(outcome).toEqual({
      status: "transient_failure",
      error: "model unavailable",
    });
    expect(insert).not.toHaveBeenCalled();
  });

  it("should report an exception thrown by the store as transient", async () => {
    const insert = vi.fn<ArticleStore["insert"]>(() => {
      throw new Error("disk I/O error");
    });

    const outcome = await processArticle(input, {
      store: fakeStore(insert),
      classifier,
      logger,
    });

    expect(outcome).toEqual({ status: "transient_failure", error: "disk I/O error" });
  });
});

describe("createArticleTaskHandler", () => {
  it("should process a well-formed queue payload", async () => {
    const store = createArticleStore(createTestDatabase());
    const handle = createArticleTaskHandler({ store, classifier, logger });

    const outcome = await handle({
      title: "Attack",
      summary: "Officials said terror suspects were arrested",
      pub_date: "Tue, 02 Jan 2024 08:30:00 GMT",
      source_url: "http://example.com/a2",
    });

    expect(outcome).toEqual({ status: "succeeded", articleId: 1, category: "Terrorism" });
  });

  it("should fail permanently on a payload missing fields", async () => {
    const store = createArticleStore(createTestDatabase());
    const handle = createArticleTaskHandler({ store, classifier, logger });

    const outcome = await handle({ title: "Only a title" });

    expect(outcome.status).toBe("permanent_failure");
    expect(store.count()).toBe(0);
  });
});
