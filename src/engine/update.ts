// pattern: Imperative Shell
import type { Logger } from "pino";
import { errorMessage } from "../errors";
import type { Notifier } from "../notify/types";
import type { FeedSource } from "../source/types";
import type { FeedRef, Subscriber, SubscriptionStore } from "../store/types";
import { createDeadline } from "./deadline";
import type { Deadline } from "./deadline";
import { formatItemMessage, resolveFreshness, selectNewItems } from "./items";
import type { DatedItem } from "./items";
import { handleFetchFailure } from "./quarantine";
import type { QuarantineDeps, QuarantineSettings } from "./quarantine";

export type UpdateSettings = {
  readonly passTimeoutMs: number;
  readonly quarantine: QuarantineSettings;
};

export type UpdateDeps = {
  readonly store: SubscriptionStore;
  readonly source: FeedSource;
  readonly notifier: Notifier;
  readonly logger: Logger;
  readonly settings: UpdateSettings;
  readonly now?: () => Date;
};

export type PassStatus = "completed" | "deadline_exceeded" | "aborted" | "failed";

export type UpdatePassResult = {
  readonly status: PassStatus;
  readonly feedsProcessed: number;
  readonly feedsFailed: number;
  readonly delivered: number;
  readonly sendFailures: number;
  readonly quarantined: number;
  readonly error: string | null;
};

type PassStats = {
  feedsProcessed: number;
  feedsFailed: number;
  delivered: number;
  sendFailures: number;
  quarantined: number;
};

// "continue" moves on to the next feed or subscriber; the others end the pass.
type StepOutcome = "continue" | "deadline_exceeded" | "aborted";

type PassContext = {
  readonly deps: UpdateDeps;
  readonly quarantine: QuarantineDeps;
  readonly deadline: Deadline;
  readonly shutdown: AbortSignal | undefined;
  readonly stats: PassStats;
};

function checkpoint(ctx: PassContext): StepOutcome {
  if (ctx.shutdown?.aborted) return "aborted";
  if (ctx.deadline.expired()) return "deadline_exceeded";
  return "continue";
}

/**
 * Delivers a subscriber's new items one message at a time, oldest first,
 * advancing its progress marker to each item's publish time after the send
 * succeeds. A failed send stops this subscriber without advancing, so the
 * item is retried on the next pass.
 */
async function deliverToSubscriber(
  ctx: PassContext,
  feed: FeedRef,
  subscriber: Subscriber,
  items: ReadonlyArray<DatedItem>,
): Promise<StepOutcome> {
  const { store, notifier, logger } = ctx.deps;

  for (const item of items) {
    const result = await notifier.send(
      subscriber.destinationId,
      formatItemMessage(item),
      ctx.deadline.signal,
    );

    if (!result.success) {
      ctx.stats.sendFailures++;
      logger.warn(
        { feedId: feed.id, destinationId: subscriber.destinationId, error: result.error },
        "delivery failed, leaving progress unchanged",
      );
      return checkpoint(ctx);
    }

    ctx.stats.delivered++;

    if (!store.advanceSubscription(subscriber.destinationId, feed.id, item.publishedAt)) {
      logger.info(
        { feedId: feed.id, destinationId: subscriber.destinationId },
        "subscription removed during delivery",
      );
      return checkpoint(ctx);
    }

    const outcome = checkpoint(ctx);
    if (outcome !== "continue") return outcome;
  }

  return "continue";
}

async function recordFailure(
  ctx: PassContext,
  feed: FeedRef,
  reason: string,
): Promise<void> {
  ctx.stats.feedsFailed++;
  // Removal notices are not awaited; only shutdown cancels them.
  const outcome = await handleFetchFailure(ctx.quarantine, feed, reason, ctx.shutdown);
  if (outcome.quarantined) ctx.stats.quarantined++;
}

async function processFeed(ctx: PassContext, feed: FeedRef): Promise<StepOutcome> {
  const { store, source, logger } = ctx.deps;

  try {
    const fetched = await source.fetch(feed.url, ctx.deadline.signal);

    if (!fetched.success) {
      // A fetch cut short by the deadline says nothing about the feed.
      const outcome = checkpoint(ctx);
      if (outcome !== "continue") return outcome;

      await recordFailure(ctx, feed, fetched.error);
      return "continue";
    }

    const freshness = resolveFreshness(fetched.document);
    if (!freshness) {
      await recordFailure(ctx, feed, "document has no update or publish time");
      return "continue";
    }

    ctx.stats.feedsProcessed++;

    const subscribers = store.listSubscribers(feed.id, freshness, {
      signal: ctx.deadline.signal,
    });

    try {
      for await (const subscriber of subscribers) {
        const items = selectNewItems(fetched.document.items, subscriber.lastUpdate);
        if (items.length === 0) continue;

        logger.debug(
          { feedId: feed.id, destinationId: subscriber.destinationId, itemCount: items.length },
          "delivering new items",
        );

        const outcome = await deliverToSubscriber(ctx, feed, subscriber, items);
        if (outcome !== "continue") return outcome;
      }
    } finally {
      subscribers.close();
    }

    if (subscribers.error) {
      logger.warn(
        { feedId: feed.id, error: errorMessage(subscribers.error) },
        "subscriber listing ended early",
      );
    }

    return checkpoint(ctx);
  } catch (err) {
    logger.error(
      { feedId: feed.id, url: feed.url, error: errorMessage(err) },
      "unexpected error during feed processing, skipping feed",
    );
    return checkpoint(ctx);
  }
}

/**
 * Runs one update pass over every feed.
 *
 * The pass ends early with `deadline_exceeded` once `passTimeoutMs` has
 * elapsed, and with `aborted` when `shutdown` fires. Failing to list feeds
 * at all ends it with `failed`. Nothing here throws; the result is for the
 * caller to log.
 */
export async function runUpdatePass(
  deps: UpdateDeps,
  shutdown?: AbortSignal,
): Promise<UpdatePassResult> {
  const now = deps.now ?? (() => new Date());
  const deadline = createDeadline(deps.settings.passTimeoutMs, shutdown, now);
  const ctx: PassContext = {
    deps,
    deadline,
    shutdown,
    quarantine: {
      store: deps.store,
      notifier: deps.notifier,
      logger: deps.logger,
      settings: deps.settings.quarantine,
      now,
    },
    stats: { feedsProcessed: 0, feedsFailed: 0, delivered: 0, sendFailures: 0, quarantined: 0 },
  };

  const finish = (status: PassStatus, error: string | null = null): UpdatePassResult => {
    const result: UpdatePassResult = { status, error, ...ctx.stats };
    if (status === "completed") {
      deps.logger.info(result, "update pass complete");
    } else {
      deps.logger.warn(result, "update pass ended early");
    }
    return result;
  };

  deps.logger.info({ deadline: deadline.at }, "update pass starting");

  const feeds = deps.store.listAllFeeds({ signal: deadline.signal });
  let outcome: StepOutcome = "continue";

  try {
    for await (const feed of feeds) {
      outcome = await processFeed(ctx, feed);
      if (outcome !== "continue") break;
    }
  } catch (err) {
    return finish("failed", `listing feeds failed: ${errorMessage(err)}`);
  } finally {
    feeds.close();
  }

  if (outcome === "continue" && deadline.signal.aborted) {
    outcome = shutdown?.aborted ? "aborted" : "deadline_exceeded";
  }

  if (outcome !== "continue") {
    return finish(outcome, outcome === "aborted" ? "pass aborted by shutdown" : "pass deadline exceeded");
  }

  if (feeds.error) {
    return finish("completed", `feed listing ended early: ${errorMessage(feeds.error)}`);
  }

  return finish("completed");
}
