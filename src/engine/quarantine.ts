import pLimit from "p-limit";
import type { Logger } from "pino";
import type { Notifier } from "../notify/types";
import type { FeedRef, SubscriptionStore } from "../store/types";
import { formatRemovalNotice } from "./items";

export type QuarantineSettings = {
  readonly windowMs: number;
  readonly failureThreshold: number;
  readonly notifyConcurrency: number;
};

export type QuarantineDeps = {
  readonly store: SubscriptionStore;
  readonly notifier: Notifier;
  readonly logger: Logger;
  readonly settings: QuarantineSettings;
  readonly now: () => Date;
};

export type NoticeSummary = {
  readonly notified: number;
  readonly notifyFailures: number;
};

export type QuarantineOutcome =
  | { readonly quarantined: false; readonly failures: number }
  | {
      readonly quarantined: true;
      readonly failures: number;
      readonly recipients: number;
      /** Settles once every removal notice was attempted; never rejects. */
      readonly notices: Promise<NoticeSummary>;
    };

export function shouldQuarantine(
  recentFailures: number,
  failureThreshold: number,
): boolean {
  return recentFailures >= failureThreshold;
}

async function sendRemovalNotices(
  deps: QuarantineDeps,
  feed: FeedRef,
  destinations: ReadonlyArray<string>,
  signal: AbortSignal | undefined,
): Promise<NoticeSummary> {
  const { logger, settings } = deps;
  const limit = pLimit(settings.notifyConcurrency);
  const notice = formatRemovalNotice(feed.url);

  const results = await Promise.allSettled(
    destinations.map((destinationId) =>
      limit(async () => {
        const result = await deps.notifier.send(destinationId, notice, signal);
        if (!result.success) {
          logger.warn(
            { destinationId, feedId: feed.id, error: result.error },
            "removal notice not delivered",
          );
        }
        return result.success;
      }),
    ),
  );

  let notified = 0;
  for (const result of results) {
    if (result.status === "fulfilled") {
      if (result.value) notified++;
    } else {
      const message =
        result.reason instanceof Error ? result.reason.message : String(result.reason);
      logger.error({ feedId: feed.id, error: message }, "removal notice threw");
    }
  }

  const summary = { notified, notifyFailures: destinations.length - notified };
  logger.info({ feedId: feed.id, url: feed.url, ...summary }, "removal notices finished");
  return summary;
}

/**
 * Records a failed fetch and drops the feed once it has failed
 * `failureThreshold` times within the rolling window.
 *
 * Each destination that was subscribed gets one removal notice. Notices go
 * out in the background: the returned outcome does not wait for them, and
 * `notices` settles when they are done. A failed notice is logged and the
 * drop stands. `signal` cancels notices still in flight.
 */
export async function handleFetchFailure(
  deps: QuarantineDeps,
  feed: FeedRef,
  reason: string,
  signal?: AbortSignal,
): Promise<QuarantineOutcome> {
  const { store, logger, settings } = deps;
  const at = deps.now();

  store.recordFetchFailure(feed.id, at);
  const failures = store.countRecentFetchFailures(
    feed.id,
    new Date(at.getTime() - settings.windowMs),
  );

  if (!shouldQuarantine(failures, settings.failureThreshold)) {
    logger.warn(
      { feedId: feed.id, url: feed.url, failures, error: reason },
      "feed fetch failed",
    );
    return { quarantined: false, failures };
  }

  const destinations = store.dropFeed(feed.id);
  logger.warn(
    { feedId: feed.id, url: feed.url, failures, subscribers: destinations.length, error: reason },
    "feed quarantined after repeated failures",
  );

  return {
    quarantined: true,
    failures,
    recipients: destinations.length,
    notices: sendRemovalNotices(deps, feed, destinations, signal),
  };
}
