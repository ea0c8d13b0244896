// pattern: Imperative Shell
import type { AppDatabase } from "../db";
import type { QuotaLimits } from "../config";
import {
  addSubscription,
  advanceSubscription,
  countSubscriptions,
  listSubscribers,
  listSubscriptions,
  removeSubscription,
} from "./subscriptions";
import {
  countFeeds,
  countRecentFetchFailures,
  dropFeed,
  listAllFeeds,
  lookupFeedByUrl,
  pruneOrphanFeeds,
  recordFetchFailure,
} from "./feeds";
import { countRecentRequests, recordRequest } from "./requests";
import type { SubscriptionStore } from "./types";

export type StoreOptions = {
  readonly limits: QuotaLimits;
  readonly pageSize: number;
  /** How long fetch failures are kept; older ones are pruned on write. */
  readonly failureRetentionMs?: number;
  readonly now?: () => Date;
};

/**
 * Binds the store operations to one database handle.
 */
export function createSubscriptionStore(
  db: AppDatabase,
  options: StoreOptions,
): SubscriptionStore {
  const now = options.now ?? (() => new Date());
  const { limits, pageSize, failureRetentionMs } = options;

  return {
    addSubscription: (request) => addSubscription(db, limits, request, now()),
    removeSubscription: (destinationId, position) =>
      removeSubscription(db, destinationId, position),
    listSubscriptions: (destinationId, streamOptions) =>
      listSubscriptions(db, destinationId, pageSize, streamOptions),
    listAllFeeds: (streamOptions) => listAllFeeds(db, pageSize, streamOptions),
    listSubscribers: (feedId, notAfter, streamOptions) =>
      listSubscribers(db, feedId, notAfter, pageSize, streamOptions),
    advanceSubscription: (destinationId, feedId, at) =>
      advanceSubscription(db, destinationId, feedId, at),
    recordFetchFailure: (feedId, at) =>
      recordFetchFailure(
        db,
        feedId,
        at,
        failureRetentionMs === undefined
          ? undefined
          : new Date(at.getTime() - failureRetentionMs),
      ),
    countRecentFetchFailures: (feedId, since) => countRecentFetchFailures(db, feedId, since),
    dropFeed: (feedId) => dropFeed(db, feedId),
    lookupFeedByUrl: (url) => lookupFeedByUrl(db, url),
    pruneOrphanFeeds: () => pruneOrphanFeeds(db),
    recordRequest: (entry) => recordRequest(db, entry),
    countRecentRequests: (ownerId, since) => countRecentRequests(db, ownerId, since),
    countFeeds: () => countFeeds(db),
    countSubscriptions: () => countSubscriptions(db),
  };
}

export { PagedCursor, collect } from "./cursor";
export { evaluateQuota } from "./quota";
export { normalizeFeedUrl, isFetchableUrl } from "./url";
export type { Cursor, CursorOptions, PageLoader } from "./cursor";
export type {
  AdmissionRequest,
  AdmissionResult,
  Feed,
  FeedRef,
  QuotaCounts,
  QuotaLimit,
  RequestLogEntry,
  StreamOptions,
  SubscribedFeed,
  Subscriber,
  SubscriptionStore,
} from "./types";
