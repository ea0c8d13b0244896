import { and, asc, eq, gt, lt, sql } from "drizzle-orm";
import type { QuotaLimits } from "../config";
import type { AppDatabase } from "../db";
import { feeds, subscriptions } from "../db/schema";
import { PagedCursor } from "./cursor";
import type { Cursor } from "./cursor";
import { guardStore } from "./guard";
import { evaluateQuota } from "./quota";
import { normalizeFeedUrl } from "./url";
import type {
  AdmissionRequest,
  AdmissionResult,
  Feed,
  QuotaCounts,
  StreamOptions,
  SubscribedFeed,
  Subscriber,
} from "./types";

/**
 * Subscribes a destination to a feed, creating the feed on first use.
 *
 * A destination already subscribed to the feed gets `already_subscribed`
 * whatever its quota. The duplicate check, the quota counts, the feed
 * lookup-or-insert and the subscription insert run in one IMMEDIATE
 * transaction, so concurrent admissions are serialized
 * and each one sees the counts the previous one committed.
 */
export function addSubscription(
  db: AppDatabase,
  limits: QuotaLimits,
  request: AdmissionRequest,
  now: Date,
): AdmissionResult {
  const urlKey = normalizeFeedUrl(request.url);

  return guardStore(
    "add subscription",
    () =>
      db.transaction(
        (tx): AdmissionResult => {
          const known = tx
            .select({ id: feeds.id, url: feeds.url, title: feeds.title })
            .from(feeds)
            .where(eq(feeds.urlKey, urlKey))
            .get();

          if (known) {
            const existing = tx
              .select({ id: subscriptions.id })
              .from(subscriptions)
              .where(
                and(
                  eq(subscriptions.destinationId, request.destinationId),
                  eq(subscriptions.feedId, known.id),
                ),
              )
              .get();
            if (existing) {
              return { status: "already_subscribed", feed: known };
            }
          }

          const counts = tx.get<QuotaCounts>(sql`
            select
              (select count(*) from ${subscriptions}
                where ${subscriptions.destinationId} = ${request.destinationId}) as destination,
              (select count(*) from ${feeds}
                where ${feeds.ownerId} = ${request.ownerId}) as ownerTotal,
              (select count(*) from ${subscriptions}
                where ${subscriptions.ownerId} = ${request.ownerId}) as ownerActive
          `);

          const exceeded = evaluateQuota(counts, limits);
          if (exceeded) {
            return { status: "quota_exceeded", limit: exceeded };
          }

          const feed: Feed =
            known ??
            tx
              .insert(feeds)
              .values({
                url: request.url.trim(),
                urlKey,
                title: request.title,
                ownerId: request.ownerId,
              })
              .returning({ id: feeds.id, url: feeds.url, title: feeds.title })
              .get();

          tx.insert(subscriptions)
            .values({
              destinationId: request.destinationId,
              feedId: feed.id,
              ownerId: request.ownerId,
              lastUpdate: now,
            })
            .run();

          return { status: "subscribed", feed };
        },
        { behavior: "immediate" },
      ),
    { destinationId: request.destinationId, url: request.url },
  );
}

/**
 * Removes the subscription at a 1-based position of the destination's
 * insertion-ordered list. Returns the feed it pointed at, or null when the
 * position is out of range.
 */
export function removeSubscription(
  db: AppDatabase,
  destinationId: string,
  position: number,
): Feed | null {
  if (!Number.isInteger(position) || position < 1) return null;

  return guardStore(
    "remove subscription",
    () =>
      db.transaction((tx) => {
        const target = tx
          .select({
            subscriptionId: subscriptions.id,
            id: feeds.id,
            url: feeds.url,
            title: feeds.title,
          })
          .from(subscriptions)
          .innerJoin(feeds, eq(subscriptions.feedId, feeds.id))
          .where(eq(subscriptions.destinationId, destinationId))
          .orderBy(asc(subscriptions.id))
          .limit(1)
          .offset(position - 1)
          .get();

        if (!target) return null;

        tx.delete(subscriptions)
          .where(eq(subscriptions.id, target.subscriptionId))
          .run();

        return { id: target.id, url: target.url, title: target.title };
      }),
    { destinationId, position },
  );
}

export function listSubscriptions(
  db: AppDatabase,
  destinationId: string,
  pageSize: number,
  options: StreamOptions = {},
): Cursor<SubscribedFeed> {
  let position = 0;

  return new PagedCursor<SubscribedFeed>(
    (after, limit) =>
      guardStore(
        "list subscriptions",
        () =>
          db
            .select({
              subscriptionId: subscriptions.id,
              id: feeds.id,
              url: feeds.url,
              title: feeds.title,
            })
            .from(subscriptions)
            .innerJoin(feeds, eq(subscriptions.feedId, feeds.id))
            .where(
              and(
                eq(subscriptions.destinationId, destinationId),
                after === null ? undefined : gt(subscriptions.id, after),
              ),
            )
            .orderBy(asc(subscriptions.id))
            .limit(limit)
            .all()
            .map((row) => ({ ...row, position: ++position })),
        { destinationId },
      ),
    { pageSize, keyOf: (row) => row.subscriptionId, signal: options.signal },
  );
}

export function listSubscribers(
  db: AppDatabase,
  feedId: number,
  notAfter: Date | undefined,
  pageSize: number,
  options: StreamOptions = {},
): Cursor<Subscriber> {
  return new PagedCursor<Subscriber>(
    (after, limit) =>
      guardStore(
        "list subscribers",
        () =>
          db
            .select({
              subscriptionId: subscriptions.id,
              destinationId: subscriptions.destinationId,
              lastUpdate: subscriptions.lastUpdate,
            })
            .from(subscriptions)
            .where(
              and(
                eq(subscriptions.feedId, feedId),
                notAfter === undefined ? undefined : lt(subscriptions.lastUpdate, notAfter),
                after === null ? undefined : gt(subscriptions.id, after),
              ),
            )
            .orderBy(asc(subscriptions.id))
            .limit(limit)
            .all(),
        { feedId },
      ),
    { pageSize, keyOf: (row) => row.subscriptionId, signal: options.signal },
  );
}

/**
 * Moves a subscription's progress marker forward to `at`. The marker never
 * moves backwards. Returns false when the subscription is gone.
 */
export function advanceSubscription(
  db: AppDatabase,
  destinationId: string,
  feedId: number,
  at: Date,
): boolean {
  return guardStore(
    "advance subscription",
    () => {
      const result = db
        .update(subscriptions)
        .set({ lastUpdate: sql`max(${subscriptions.lastUpdate}, ${at.getTime()})` })
        .where(
          and(
            eq(subscriptions.destinationId, destinationId),
            eq(subscriptions.feedId, feedId),
          ),
        )
        .run();
      return result.changes > 0;
    },
    { destinationId, feedId },
  );
}

export function countSubscriptions(db: AppDatabase): number {
  return guardStore("count subscriptions", () =>
    db.select({ count: sql<number>`count(*)` }).from(subscriptions).get()?.count ?? 0,
  );
}
