import { describe, it, expect } from "vitest";
import { eq } from "drizzle-orm";
import { createTestDatabase, seedTestFeed, seedTestSubscription } from "./db";
import { feeds, subscriptions } from "../db/schema";

describe("test database utilities", () => {
  it("creates an empty migrated database", () => {
    const db = createTestDatabase();
    expect(db.select().from(feeds).all()).toEqual([]);
  });

  it("seeds a feed keyed by its scheme-less URL", () => {
    const db = createTestDatabase();
    const feedId = seedTestFeed(db, { url: "https://custom.example.com/rss", title: "Custom" });

    const row = db.select().from(feeds).where(eq(feeds.id, feedId)).get();

    expect(row).toMatchObject({
      url: "https://custom.example.com/rss",
      urlKey: "custom.example.com/rss",
      title: "Custom",
      ownerId: "owner-1",
    });
  });

  it("seeds a subscription with a default progress marker", () => {
    const db = createTestDatabase();
    const feedId = seedTestFeed(db);
    const subscriptionId = seedTestSubscription(db, feedId);

    const row = db.select().from(subscriptions).where(eq(subscriptions.id, subscriptionId)).get();

    expect(row?.destinationId).toBe("dest-1");
    expect(row?.lastUpdate).toEqual(new Date("2026-01-01T00:00:00Z"));
  });
});
