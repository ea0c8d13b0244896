import { and, asc, eq, gt, gte, lt, sql } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { feedErrors, feeds, subscriptions } from "../db/schema";
import { PagedCursor } from "./cursor";
import type { Cursor } from "./cursor";
import { guardStore } from "./guard";
import { normalizeFeedUrl } from "./url";
import type { Feed, FeedRef, StreamOptions } from "./types";

export function listAllFeeds(
  db: AppDatabase,
  pageSize: number,
  options: StreamOptions = {},
): Cursor<FeedRef> {
  return new PagedCursor<FeedRef>(
    (after, limit) =>
      guardStore("list feeds", () =>
        db
          .select({ id: feeds.id, url: feeds.url })
          .from(feeds)
          .where(after === null ? undefined : gt(feeds.id, after))
          .orderBy(asc(feeds.id))
          .limit(limit)
          .all(),
      ),
    { pageSize, keyOf: (row) => row.id, signal: options.signal },
  );
}

export function lookupFeedByUrl(db: AppDatabase, url: string): Feed | null {
  return guardStore(
    "look up feed",
    () =>
      db
        .select({ id: feeds.id, url: feeds.url, title: feeds.title })
        .from(feeds)
        .where(eq(feeds.urlKey, normalizeFeedUrl(url)))
        .get() ?? null,
    { url },
  );
}

/**
 * Deletes a feed together with its subscriptions and failure log, and
 * returns the destinations that were subscribed to it.
 */
export function dropFeed(db: AppDatabase, feedId: number): ReadonlyArray<string> {
  return guardStore(
    "drop feed",
    () =>
      db.transaction((tx) => {
        const subscribers = tx
          .select({ destinationId: subscriptions.destinationId })
          .from(subscriptions)
          .where(eq(subscriptions.feedId, feedId))
          .orderBy(asc(subscriptions.id))
          .all();

        tx.delete(subscriptions).where(eq(subscriptions.feedId, feedId)).run();
        tx.delete(feedErrors).where(eq(feedErrors.feedId, feedId)).run();
        tx.delete(feeds).where(eq(feeds.id, feedId)).run();

        return subscribers.map((s) => s.destinationId);
      }),
    { feedId },
  );
}

/** Deletes feeds that no destination subscribes to. Returns how many went. */
export function pruneOrphanFeeds(db: AppDatabase): number {
  return guardStore("prune orphan feeds", () => {
    const result = db
      .delete(feeds)
      .where(
        sql`not exists (select 1 from ${subscriptions} where ${subscriptions.feedId} = ${feeds.id})`,
      )
      .run();
    return result.changes;
  });
}

/**
 * Appends a fetch failure. Entries older than `retainSince` are discarded
 * in the same transaction, since only the recent window is ever counted.
 */
export function recordFetchFailure(
  db: AppDatabase,
  feedId: number,
  at: Date,
  retainSince?: Date,
): void {
  guardStore(
    "record fetch failure",
    () =>
      db.transaction((tx) => {
        tx.insert(feedErrors).values({ feedId, occurredAt: at }).run();

        if (retainSince) {
          tx.delete(feedErrors)
            .where(and(eq(feedErrors.feedId, feedId), lt(feedErrors.occurredAt, retainSince)))
            .run();
        }
      }),
    { feedId },
  );
}

export function countRecentFetchFailures(
  db: AppDatabase,
  feedId: number,
  since: Date,
): number {
  return guardStore(
    "count fetch failures",
    () =>
      db
        .select({ count: sql<number>`count(*)` })
        .from(feedErrors)
        .where(and(eq(feedErrors.feedId, feedId), gte(feedErrors.occurredAt, since)))
        .get()?.count ?? 0,
    { feedId },
  );
}

export function countFeeds(db: AppDatabase): number {
  return guardStore("count feeds", () =>
    db.select({ count: sql<number>`count(*)` }).from(feeds).get()?.count ?? 0,
  );
}
