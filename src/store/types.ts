import type { Cursor } from "./cursor";

export type Feed = {
  readonly id: number;
  readonly url: string;
  readonly title: string;
};

export type FeedRef = {
  readonly id: number;
  readonly url: string;
};

export type SubscribedFeed = Feed & {
  readonly subscriptionId: number;
  /** 1-based rank within the destination, by insertion order. */
  readonly position: number;
};

export type Subscriber = {
  readonly subscriptionId: number;
  readonly destinationId: string;
  readonly lastUpdate: Date;
};

/** Quota dimensions, in the priority order they are reported. */
export type QuotaLimit = "destination" | "owner_total" | "owner_active";

export type QuotaCounts = {
  readonly destination: number;
  readonly ownerTotal: number;
  readonly ownerActive: number;
};

export type AdmissionRequest = {
  readonly ownerId: string;
  readonly destinationId: string;
  readonly url: string;
  readonly title: string;
};

export type AdmissionResult =
  | { readonly status: "subscribed"; readonly feed: Feed }
  | { readonly status: "already_subscribed"; readonly feed: Feed }
  | { readonly status: "quota_exceeded"; readonly limit: QuotaLimit };

export type RequestLogEntry = {
  readonly ownerId: string;
  readonly name: string;
  readonly text: string;
  readonly at: Date;
};

export type StreamOptions = {
  readonly signal?: AbortSignal;
};

/**
 * Durable storage for feeds, subscriptions, fetch failures and the request
 * log. Every method may throw `StoreError`.
 */
export type SubscriptionStore = {
  readonly addSubscription: (request: AdmissionRequest) => AdmissionResult;
  readonly removeSubscription: (destinationId: string, position: number) => Feed | null;
  readonly listSubscriptions: (
    destinationId: string,
    options?: StreamOptions,
  ) => Cursor<SubscribedFeed>;
  readonly listAllFeeds: (options?: StreamOptions) => Cursor<FeedRef>;
  /** Without `notAfter`, every subscriber of the feed. */
  readonly listSubscribers: (
    feedId: number,
    notAfter?: Date,
    options?: StreamOptions,
  ) => Cursor<Subscriber>;
  /** Returns false when the subscription no longer exists. */
  readonly advanceSubscription: (destinationId: string, feedId: number, at: Date) => boolean;
  readonly recordFetchFailure: (feedId: number, at: Date) => void;
  readonly countRecentFetchFailures: (feedId: number, since: Date) => number;
  /** Deletes the feed with its subscriptions; returns the destinations that were subscribed. */
  readonly dropFeed: (feedId: number) => ReadonlyArray<string>;
  readonly lookupFeedByUrl: (url: string) => Feed | null;
  readonly pruneOrphanFeeds: () => number;
  readonly recordRequest: (entry: RequestLogEntry) => void;
  readonly countRecentRequests: (ownerId: string, since: Date) => number;
  readonly countFeeds: () => number;
  readonly countSubscriptions: () => number;
};
