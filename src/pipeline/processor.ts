// pattern: imperative-shell
import type { Logger } from "pino";
import type { Classifier } from "../classifier";
import type { ArticleStore } from "./store";
import { parsePublishedDate } from "./pub-date";
import { articleTaskPayloadSchema, fromTaskPayload } from "./types";
import type { ArticleInput, ProcessOutcome } from "./types";

export type ProcessDeps = {
  readonly store: ArticleStore;
  readonly classifier: Classifier;
  readonly logger: Logger;
};

/**
 * Runs one delivery of an article: parse date → classify → insert.
 *
 * Never throws. A bad publication date is a permanent failure and is reported
 * before any classification or write; store and classifier failures are
 * transient. Whether a transient failure is retried is up to the caller.
 */
export async function processArticle(
  input: ArticleInput,
  deps: ProcessDeps,
): Promise<ProcessOutcome> {
  const { logger } = deps;
  const title = input.title;

  logger.info({ title, sourceUrl: input.sourceUrl }, "processing article");

  const parsed = parsePublishedDate(input.pubDate);
  if (!parsed.ok) {
    logger.error(
      { title, pubDate: input.pubDate, error: parsed.error },
      "article has malformed publication date, not retrying",
    );
    return { status: "permanent_failure", error: parsed.error };
  }

  try {
    const category = await deps.classifier.classify(input.summary);

    const result = deps.store.insert({
      title: input.title,
      summary: input.summary,
      pubDate: parsed.date,
      sourceUrl: input.sourceUrl,
      category,
    });

    if (result.ok) {
      logger.info(
        { title, articleId: result.id, category },
        "article added",
      );
      return { status: "succeeded", articleId: result.id, category };
    }

    if (result.error.kind === "duplicate") {
      logger.warn(
        { title, sourceUrl: input.sourceUrl },
        "duplicate article detected, skipping",
      );
      return { status: "skipped", reason: "duplicate" };
    }

    logger.error({ title, error: result.error.message }, "article store failed");
    return { status: "transient_failure", error: result.error.message };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ title, error: message }, "error processing article");
    return { status: "transient_failure", error: message };
  }
}

/**
 * Queue-facing wrapper: validates the task payload, then processes it.
 * A payload that does not have the article shape can never succeed.
 */
export function createArticleTaskHandler(
  deps: ProcessDeps,
): (payload: unknown) => Promise<ProcessOutcome> {
  return async (payload) => {
    const parsed = articleTaskPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ");
      deps.logger.error({ issues }, "invalid article task payload");
      return { status: "permanent_failure", error: `invalid payload: ${issues}` };
    }
    return processArticle(fromTaskPayload(parsed.data), deps);
  };
}
