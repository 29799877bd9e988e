export { fetchFeed, createFeedFetcher } from "./fetcher";
export { normalizeEntry, NO_TITLE, NO_SUMMARY, NO_PUB_DATE, NO_LINK } from "./normalizer";
export { parsePublishedDate } from "./pub-date";
export { createArticleStore, isSourceUrlConflict } from "./store";
export { processArticle, createArticleTaskHandler } from "./processor";
export { dispatchFeeds } from "./dispatcher";
export { PROCESS_ARTICLE_TASK } from "./types";
export type {
  RawEntry,
  ArticleInput,
  ArticleTaskPayload,
  FetchResult,
  FetchError,
  NewArticle,
  StoreResult,
  StoreError,
  ProcessOutcome,
  DispatchSummary,
} from "./types";
export type { ArticleStore } from "./store";
export type { FetchFeedFn, FetchFeedOptions } from "./fetcher";
export type { ProcessDeps } from "./processor";
export type { DispatchDeps, SubmitFn } from "./dispatcher";
