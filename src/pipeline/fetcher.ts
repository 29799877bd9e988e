import Parser from "rss-parser";
import type { Logger } from "pino";
import type { FetchResult, RawEntry } from "./types";

export type FetchFeedOptions = {
  readonly timeoutMs: number;
  readonly userAgent: string;
};

export type FetchFeedFn = (feedUrl: string) => Promise<FetchResult>;

const parser = new Parser();

function toRawEntry(item: Parser.Item): RawEntry {
  return {
    title: item.title,
    link: item.link,
    pubDate: item.pubDate,
    summary: item.summary,
    contentSnippet: item.contentSnippet,
    content: item.content,
  };
}

/**
 * Downloads a feed and parses it into raw entries.
 *
 * Transport problems (rejection, timeout, non-2xx) are reported as `unreachable`;
 * a body rss-parser cannot read is `malformed`, and none of its entries are returned.
 * Nothing is retried here.
 */
export async function fetchFeed(
  feedUrl: string,
  options: FetchFeedOptions,
  logger: Logger,
): Promise<FetchResult> {
  let body: string;
  try {
    const response = await fetch(feedUrl, {
      signal: AbortSignal.timeout(options.timeoutMs),
      headers: {
        "User-Agent": options.userAgent,
        Accept: "application/rss+xml, application/atom+xml, application/xml, text/xml",
      },
    });

    if (!response.ok) {
      const message = `HTTP ${response.status}: ${response.statusText}`;
      logger.warn({ feedUrl, error: message }, "feed unreachable");
      return { success: false, feedUrl, error: { kind: "unreachable", message } };
    }

    body = await response.text();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ feedUrl, error: message }, "feed unreachable");
    return { success: false, feedUrl, error: { kind: "unreachable", message } };
  }

  try {
    const feed = await parser.parseString(body);
    const entries = feed.items.map(toRawEntry);
    logger.info({ feedUrl, entryCount: entries.length }, "feed parsed");
    return { success: true, feedUrl, entries };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ feedUrl, error: message }, "feed malformed");
    return { success: false, feedUrl, error: { kind: "malformed", message } };
  }
}

/**
 * Binds fetch options and logger so the dispatcher only deals in URLs.
 */
export function createFeedFetcher(
  options: FetchFeedOptions,
  logger: Logger,
): FetchFeedFn {
  return (feedUrl) => fetchFeed(feedUrl, options, logger);
}
