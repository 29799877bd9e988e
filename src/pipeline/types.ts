import { z } from "zod";

/**
 * One item of a parsed feed, as rss-parser hands it over.
 */
export type RawEntry = {
  readonly title?: string;
  readonly link?: string;
  readonly pubDate?: string;
  readonly summary?: string;
  readonly contentSnippet?: string;
  readonly content?: string;
};

export type ArticleInput = {
  readonly title: string;
  readonly summary: string;
  readonly pubDate: string;
  readonly sourceUrl: string;
};

// Queue payload shape: snake_case keys, every field a string.
export const articleTaskPayloadSchema = z.object({
  title: z.string(),
  summary: z.string(),
  pub_date: z.string(),
  source_url: z.string(),
});

export type ArticleTaskPayload = z.infer<typeof articleTaskPayloadSchema>;

export const PROCESS_ARTICLE_TASK = "process_article";

export function toTaskPayload(input: ArticleInput): ArticleTaskPayload {
  return {
    title: input.title,
    summary: input.summary,
    pub_date: input.pubDate,
    source_url: input.sourceUrl,
  };
}

export function fromTaskPayload(payload: ArticleTaskPayload): ArticleInput {
  return {
    title: payload.title,
    summary: payload.summary,
    pubDate: payload.pub_date,
    sourceUrl: payload.source_url,
  };
}

type FetchErrorKind = "malformed" | "unreachable";

export type FetchError = {
  readonly kind: FetchErrorKind;
  readonly message: string;
};

export type FetchResult =
  | { success: true; feedUrl: string; entries: ReadonlyArray<RawEntry> }
  | { success: false; feedUrl: string; error: FetchError };

export type NewArticle = {
  readonly title: string;
  readonly summary: string;
  readonly pubDate: Date;
  readonly sourceUrl: string;
  readonly category: string;
};

export type StoreError =
  | { readonly kind: "duplicate" }
  | { readonly kind: "fatal"; readonly message: string };

export type StoreResult =
  | { ok: true; id: number }
  | { ok: false; error: StoreError };

export type ProcessOutcome =
  | { status: "succeeded"; articleId: number; category: string }
  | { status: "skipped"; reason: "duplicate" }
  | { status: "permanent_failure"; error: string }
  | { status: "transient_failure"; error: string };

export type DispatchSummary = {
  readonly feedsTotal: number;
  readonly feedsFailed: number;
  readonly submitted: number;
  readonly rejected: number;
};
