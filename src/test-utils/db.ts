import pino from "pino";
import { createDatabase, migrateDatabase } from "../db";
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import { feeds, subscriptions } from "../db/schema";
import { createSubscriptionStore, normalizeFeedUrl } from "../store";
import type { StoreOptions } from "../store";
import type { SubscriptionStore } from "../store";
import { createCommandService } from "../commands/service";
import type { FeedSource } from "../source/types";
import { createCallerFactory } from "../api/trpc";
import { appRouter } from "../api/router";

/**
 * Creates an in-memory SQLite test database with all migrations applied.
 * @returns A new AppDatabase instance with schema initialized.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  migrateDatabase(db);
  return db;
}

/**
 * Seeds a feed row directly, bypassing admission.
 * @returns The ID of the inserted feed.
 */
export function seedTestFeed(
  db: AppDatabase,
  overrides?: Partial<typeof feeds.$inferInsert>,
): number {
  const url = overrides?.url ?? `https://example.com/feed-${Math.random().toString(36).slice(2)}`;
  const result = db
    .insert(feeds)
    .values({
      url,
      urlKey: normalizeFeedUrl(url),
      title: "Test Feed",
      ownerId: "owner-1",
      ...overrides,
    })
    .returning({ id: feeds.id })
    .get();

  return result.id;
}

/**
 * Seeds a subscription row directly, bypassing admission and quotas.
 * @returns The ID of the inserted subscription.
 */
export function seedTestSubscription(
  db: AppDatabase,
  feedId: number,
  overrides?: Partial<typeof subscriptions.$inferInsert>,
): number {
  const result = db
    .insert(subscriptions)
    .values({
      destinationId: "dest-1",
      feedId,
      ownerId: "owner-1",
      lastUpdate: new Date("2026-01-01T00:00:00Z"),
      ...overrides,
    })
    .returning({ id: subscriptions.id })
    .get();

  return result.id;
}

/**
 * Creates a default AppConfig suitable for testing.
 */
export function createTestConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    limits: {
      maxFeedsPerDestination: 10,
      maxTotalFeedsByOwner: 200,
      maxActiveFeedsByOwner: 20,
    },
    schedule: {
      update: "0 * * * *",
      runOnStart: false,
    },
    update: {
      passTimeoutSeconds: 60,
      fetchTimeoutSeconds: 20,
      pageSize: 100,
    },
    quarantine: {
      windowHours: 12,
      failureThreshold: 9,
      notifyConcurrency: 4,
    },
    commands: {
      allowList: [],
      fetchTimeoutSeconds: 20,
      rateLimit: { maxRequests: 0, windowMinutes: 1 },
    },
    notifier: { kind: "webhook", url: "http://localhost:8080/deliver" },
    ...overrides,
  };
}

export function createTestStore(
  db: AppDatabase,
  options?: Partial<StoreOptions>,
): SubscriptionStore {
  return createSubscriptionStore(db, {
    limits: createTestConfig().limits,
    pageSize: 100,
    ...options,
  });
}

/**
 * Creates a fully-typed tRPC caller for testing router procedures directly.
 * @param db - The AppDatabase instance to use.
 * @param source - Feed source used to discover titles of new feeds.
 * @param configOverrides - Optional partial AppConfig to override defaults.
 */
export function createTestCaller(
  db: AppDatabase,
  source: FeedSource,
  configOverrides?: Partial<AppConfig>,
) {
  const createCaller = createCallerFactory(appRouter);
  const config = createTestConfig(configOverrides);
  const logger = pino({ level: "silent" });
  const store = createTestStore(db, { limits: config.limits });
  const commands = createCommandService({ store, source, config, logger });

  return createCaller({ commands, store, config, logger });
}
