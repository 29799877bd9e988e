import type { ArticleInput, RawEntry } from "./types";

export const NO_TITLE = "No title available";
export const NO_SUMMARY = "No summary available";
export const NO_PUB_DATE = "No publication date available";
export const NO_LINK = "No link available";

/**
 * Maps a raw feed entry onto an ArticleInput. Absent fields become the sentinel
 * strings above; the function never throws.
 */
export function normalizeEntry(entry: RawEntry): ArticleInput {
  return {
    title: entry.title ?? NO_TITLE,
    summary: entry.summary ?? entry.contentSnippet ?? entry.content ?? NO_SUMMARY,
    pubDate: entry.pubDate ?? NO_PUB_DATE,
    sourceUrl: entry.link ?? NO_LINK,
  };
}
