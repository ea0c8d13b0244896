export type FeedItem = {
  readonly title: string;
  readonly description: string;
  readonly link: string;
  readonly publishedAt: Date | null;
};

export type FeedDocument = {
  readonly title: string;
  /** The feed's own last-changed time, when it declares one. */
  readonly updatedAt: Date | null;
  readonly items: ReadonlyArray<FeedItem>;
};

export type FetchResult =
  | { readonly success: true; readonly document: FeedDocument }
  | { readonly success: false; readonly error: string };

/**
 * Fetches and parses a feed document. Never throws: network, HTTP and parse
 * failures come back as `{ success: false }`.
 */
export type FeedSource = {
  readonly fetch: (url: string, signal?: AbortSignal) => Promise<FetchResult>;
};
