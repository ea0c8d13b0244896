import { describe, it, expect, beforeEach } from "vitest";
import pino from "pino";
import { createCallerFactory } from "../trpc";
import { appRouter } from "../router";
import { StoreError } from "../../errors";
import { createCommandService } from "../../commands/service";
import {
  createTestCaller,
  createTestConfig,
  createTestDatabase,
  createTestStore,
  seedTestFeed,
  seedTestSubscription,
} from "../../test-utils/db";
import { FakeFeedSource } from "../../test-utils/fakes";
import type { AppDatabase } from "../../db";
import type { SubscriptionStore } from "../../store";

describe("system router", () => {
  let db: AppDatabase;
  const source = new FakeFeedSource();

  beforeEach(() => {
    db = createTestDatabase();
  });

  it("reports counts, schedule and limits", async () => {
    const a = seedTestFeed(db);
    seedTestFeed(db);
    seedTestSubscription(db, a, { destinationId: "dest-1" });
    seedTestSubscription(db, a, { destinationId: "dest-2" });
    const caller = createTestCaller(db, source);

    expect(await caller.system.status()).toEqual({
      feedCount: 2,
      subscriptionCount: 2,
      updateCron: "0 * * * *",
      limits: {
        maxFeedsPerDestination: 10,
        maxTotalFeedsByOwner: 200,
        maxActiveFeedsByOwner: 20,
      },
    });
  });

  it("prunes feeds without subscribers", async () => {
    const kept = seedTestFeed(db);
    seedTestFeed(db);
    seedTestFeed(db);
    seedTestSubscription(db, kept);
    const caller = createTestCaller(db, source);

    expect(await caller.system.pruneOrphans()).toEqual({ removed: 2 });
    expect((await caller.system.status()).feedCount).toBe(1);
  });

  it("reports store failures as a generic backend error", async () => {
    const config = createTestConfig();
    const logger = pino({ level: "silent" });
    const working = createTestStore(db);
    const store: SubscriptionStore = {
      ...working,
      countFeeds: () => {
        throw new StoreError("count feeds failed: disk I/O error", { operation: "count feeds" });
      },
    };
    const commands = createCommandService({ store, source, config, logger });
    const caller = createCallerFactory(appRouter)({ commands, store, config, logger });

    await expect(caller.system.status()).rejects.toMatchObject({
      code: "INTERNAL_SERVER_ERROR",
      message: "backend error",
    });
  });
});
