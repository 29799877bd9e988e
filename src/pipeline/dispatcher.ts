import type { Logger } from "pino";
import type { FetchFeedFn } from "./fetcher";
import { NO_LINK, normalizeEntry } from "./normalizer";
import {
  PROCESS_ARTICLE_TASK,
  toTaskPayload,
  type ArticleTaskPayload,
  type DispatchSummary,
} from "./types";

export type SubmitFn = (name: string, payload: ArticleTaskPayload) => number;

export type DispatchDeps = {
  readonly fetchFeed: FetchFeedFn;
  readonly submit: SubmitFn;
  readonly logger: Logger;
};

/**
 * Walks the feeds in order, normalizes every entry and submits one
 * process_article task per entry. Submission is a durable enqueue; processing
 * happens elsewhere and is never awaited here.
 *
 * A feed that fails or throws is logged and skipped. Entries without a link are
 * not submitted: they would all share the same source_url sentinel and every
 * one after the first would be dropped as a duplicate.
 */
export async function dispatchFeeds(
  feedUrls: ReadonlyArray<string>,
  deps: DispatchDeps,
): Promise<DispatchSummary> {
  const { logger } = deps;
  let feedsFailed = 0;
  let submitted = 0;
  let rejected = 0;

  for (const feedUrl of feedUrls) {
    let feedSubmitted = 0;
    try {
      const result = await deps.fetchFeed(feedUrl);

      if (!result.success) {
        feedsFailed++;
        logger.warn(
          { feedUrl, reason: result.error.kind, error: result.error.message },
          "feed skipped",
        );
        continue;
      }

      if (result.entries.length === 0) {
        logger.info({ feedUrl }, "feed has no entries");
        continue;
      }

      for (const entry of result.entries) {
        const input = normalizeEntry(entry);

        if (input.sourceUrl === NO_LINK) {
          rejected++;
          logger.warn({ feedUrl, title: input.title }, "entry has no link, not dispatched");
          continue;
        }

        const taskId = deps.submit(PROCESS_ARTICLE_TASK, toTaskPayload(input));
        feedSubmitted++;
        logger.debug({ feedUrl, taskId, title: input.title }, "article task submitted");
      }

      logger.info({ feedUrl, submitted: feedSubmitted }, "feed dispatched");
    } catch (err) {
      feedsFailed++;
      const message = err instanceof Error ? err.message : String(err);
      logger.error(
        { feedUrl, submitted: feedSubmitted, error: message },
        "unexpected error during feed dispatch",
      );
    } finally {
      submitted += feedSubmitted;
    }
  }

  const summary: DispatchSummary = {
    feedsTotal: feedUrls.length,
    feedsFailed,
    submitted,
    rejected,
  };
  logger.info(summary, "dispatch complete");
  return summary;
}
