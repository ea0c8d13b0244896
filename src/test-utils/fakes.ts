import type { FeedDocument, FeedItem, FeedSource, FetchResult } from "../source/types";
import type { Notifier, SendResult } from "../notify/types";

export type Delivery = {
  readonly destinationId: string;
  readonly text: string;
};

export function item(title: string, publishedAt: string | null): FeedItem {
  return {
    title,
    description: `${title} body`,
    link: `https://example.com/${encodeURIComponent(title)}`,
    publishedAt: publishedAt === null ? null : new Date(publishedAt),
  };
}

export function document(
  items: ReadonlyArray<FeedItem>,
  updatedAt: string | null = null,
  title = "Example Feed",
): FeedDocument {
  return {
    title,
    updatedAt: updatedAt === null ? null : new Date(updatedAt),
    items,
  };
}

/**
 * FeedSource serving fixed documents by URL; unknown URLs fail.
 */
export class FakeFeedSource implements FeedSource {
  readonly requested: Array<string> = [];
  private readonly documents = new Map<string, FetchResult>();

  serve(url: string, doc: FeedDocument): this {
    this.documents.set(url, { success: true, document: doc });
    return this;
  }

  fail(url: string, error = "connection refused"): this {
    this.documents.set(url, { success: false, error });
    return this;
  }

  readonly fetch = async (url: string): Promise<FetchResult> => {
    this.requested.push(url);
    return this.documents.get(url) ?? { success: false, error: `no document for ${url}` };
  };
}

/**
 * Notifier that records every message; destinations listed in `failFor`
 * get a failed result instead.
 */
export class RecordingNotifier implements Notifier {
  readonly sent: Array<Delivery> = [];
  readonly failFor = new Set<string>();
  onSend: ((delivery: Delivery) => void) | null = null;

  readonly send = async (destinationId: string, text: string): Promise<SendResult> => {
    if (this.failFor.has(destinationId)) {
      return { success: false, error: "destination unreachable" };
    }
    const delivery = { destinationId, text };
    this.sent.push(delivery);
    this.onSend?.(delivery);
    return { success: true };
  };
}
