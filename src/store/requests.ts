import { and, eq, gte, sql } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { requests } from "../db/schema";
import { guardStore } from "./guard";
import type { RequestLogEntry } from "./types";

export function recordRequest(db: AppDatabase, entry: RequestLogEntry): void {
  guardStore(
    "record request",
    () =>
      db.insert(requests)
        .values({
          ownerId: entry.ownerId,
          occurredAt: entry.at,
          name: entry.name,
          text: entry.text,
        })
        .run(),
    { ownerId: entry.ownerId, name: entry.name },
  );
}

export function countRecentRequests(
  db: AppDatabase,
  ownerId: string,
  since: Date,
): number {
  return guardStore(
    "count requests",
    () =>
      db
        .select({ count: sql<number>`count(*)` })
        .from(requests)
        .where(and(eq(requests.ownerId, ownerId), gte(requests.occurredAt, since)))
        .get()?.count ?? 0,
    { ownerId },
  );
}
