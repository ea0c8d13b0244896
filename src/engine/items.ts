// pattern: Functional Core
import type { FeedDocument, FeedItem } from "../source/types";

export type DatedItem = FeedItem & { readonly publishedAt: Date };

function isDated(item: FeedItem): item is DatedItem {
  return item.publishedAt !== null;
}

/**
 * When the document last changed: its declared update time, else the newest
 * item publish time, else null (no usable freshness signal).
 */
export function resolveFreshness(document: FeedDocument): Date | null {
  if (document.updatedAt) return document.updatedAt;

  let latest: Date | null = null;
  for (const item of document.items) {
    if (item.publishedAt && (!latest || item.publishedAt > latest)) {
      latest = item.publishedAt;
    }
  }
  return latest;
}

/**
 * Items published strictly after `since`, oldest first. Undated items are
 * never selected. Items with equal publish times keep document order.
 */
export function selectNewItems(
  items: ReadonlyArray<FeedItem>,
  since: Date,
): Array<DatedItem> {
  return items
    .filter(isDated)
    .filter((item) => item.publishedAt.getTime() > since.getTime())
    .sort((a, b) => a.publishedAt.getTime() - b.publishedAt.getTime());
}

export function formatItemMessage(item: FeedItem): string {
  return `${item.title}\n${item.description}\n\nLink: ${item.link}`;
}

export function formatRemovalNotice(feedUrl: string): string {
  return `The feed ${feedUrl} was removed because it failed to load repeatedly.`;
}
