export type TestFeedItem = {
  readonly title?: string;
  readonly description?: string;
  readonly pubDate?: string;
  readonly link?: string;
};

function element(tag: string, value: string | undefined): string {
  return value === undefined ? "" : `<${tag}>${value}</${tag}>`;
}

/**
 * Builds a minimal RSS 2.0 document with the given items.
 */
export function buildRssFeed(items: ReadonlyArray<TestFeedItem>): string {
  const body = items
    .map(
      (item) =>
        `<item>${element("title", item.title)}${element("description", item.description)}${element("pubDate", item.pubDate)}${element("link", item.link)}</item>`,
    )
    .join("");

  return `<?xml version="1.0" encoding="UTF-8"?><rss version="2.0"><channel><title>Test Feed</title><link>https://example.com</link><description>Test</description>${body}</channel></rss>`;
}

export function feedResponse(body: string, status = 200, statusText = "OK") {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    text: () => Promise.resolve(body),
  };
}
