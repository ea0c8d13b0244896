import { index, integer, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ---------- Tables ----------

export const feeds = sqliteTable("feeds", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  url: text("url").notNull(),
  urlKey: text("url_key").notNull().unique(),
  title: text("title").notNull().default(""),
  ownerId: text("owner_id").notNull(),
  createdAt: integer("created_at", { mode: "timestamp_ms" })
    .notNull()
    .default(sql`(unixepoch() * 1000)`),
});

// `id` doubles as the insertion sequence that ordinal positions are ranked by.
export const subscriptions = sqliteTable(
  "subscriptions",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    destinationId: text("destination_id").notNull(),
    feedId: integer("feed_id")
      .notNull()
      .references(() => feeds.id, { onDelete: "cascade" }),
    ownerId: text("owner_id").notNull(),
    lastUpdate: integer("last_update", { mode: "timestamp_ms" }).notNull(),
    createdAt: integer("created_at", { mode: "timestamp_ms" })
      .notNull()
      .default(sql`(unixepoch() * 1000)`),
  },
  (table) => ({
    destinationFeedIdx: uniqueIndex("subscriptions_destination_feed_idx").on(
      table.destinationId,
      table.feedId,
    ),
    feedIdIdx: index("subscriptions_feed_id_idx").on(table.feedId),
    ownerIdIdx: index("subscriptions_owner_id_idx").on(table.ownerId),
  }),
);

export const feedErrors = sqliteTable(
  "feed_errors",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    feedId: integer("feed_id")
      .notNull()
      .references(() => feeds.id, { onDelete: "cascade" }),
    occurredAt: integer("occurred_at", { mode: "timestamp_ms" }).notNull(),
  },
  (table) => ({
    feedIdIdx: index("feed_errors_feed_id_idx").on(table.feedId, table.occurredAt),
  }),
);

export const requests = sqliteTable(
  "requests",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    ownerId: text("owner_id").notNull(),
    occurredAt: integer("occurred_at", { mode: "timestamp_ms" }).notNull(),
    name: text("name").notNull(),
    text: text("text").notNull(),
  },
  (table) => ({
    ownerIdIdx: index("requests_owner_id_idx").on(table.ownerId, table.occurredAt),
  }),
);
