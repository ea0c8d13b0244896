// pattern: Imperative Shell
import Parser from "rss-parser";
import type { Logger } from "pino";
import type { FeedItem, FeedSource, FetchResult } from "./types";

// Channel-level dates. rss-parser copies RSS <lastBuildDate>/<pubDate> and
// maps Atom <updated> onto lastBuildDate.
type FeedExtras = {
  lastBuildDate?: string;
  pubDate?: string;
};

type ItemExtras = {
  summary?: string;
};

export type RssParser = Parser<FeedExtras, ItemExtras>;

export function createParser(): RssParser {
  return new Parser<FeedExtras, ItemExtras>();
}

export function parseDate(value: string | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value.trim());
  return Number.isNaN(date.getTime()) ? null : date;
}

export type RssFeedSourceOptions = {
  readonly timeoutMs: number;
  readonly logger: Logger;
  readonly parser?: RssParser;
  readonly userAgent?: string;
};

/**
 * FeedSource that downloads a document with `fetch` and parses it with
 * rss-parser. Each request is bounded by `timeoutMs` and by the caller's
 * signal, whichever fires first.
 */
export function createRssFeedSource(options: RssFeedSourceOptions): FeedSource {
  const parser = options.parser ?? createParser();
  const userAgent = options.userAgent ?? "feedrelay/0.1 (feed poller)";

  return {
    async fetch(url: string, signal?: AbortSignal): Promise<FetchResult> {
      const timeout = AbortSignal.timeout(options.timeoutMs);

      try {
        const response = await fetch(url, {
          signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
          headers: {
            "User-Agent": userAgent,
            Accept: "application/rss+xml, application/atom+xml, application/xml, text/xml;q=0.9, */*;q=0.8",
          },
        });

        if (!response.ok) {
          return {
            success: false,
            error: `HTTP ${response.status}: ${response.statusText}`,
          };
        }

        const feed = await parser.parseString(await response.text());

        const items: Array<FeedItem> = feed.items.map((item) => ({
          title: item.title?.trim() ?? "",
          description: (item.contentSnippet ?? item.summary ?? "").trim(),
          link: item.link ?? "",
          publishedAt: parseDate(item.isoDate) ?? parseDate(item.pubDate),
        }));

        const updatedAt = parseDate(feed.lastBuildDate) ?? parseDate(feed.pubDate);

        options.logger.debug(
          { url, itemCount: items.length, updatedAt },
          "feed fetched",
        );
        return {
          success: true,
          document: { title: feed.title?.trim() ?? "", updatedAt, items },
        };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        options.logger.warn({ url, error: message }, "feed fetch failed");
        return { success: false, error: message };
      }
    },
  };
}
