import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { createDatabase, migrateDatabase } from "./db";
import { createSubscriptionStore } from "./store";
import { createRssFeedSource } from "./source/rss";
import { createNotifier } from "./notify";
import { createCommandService } from "./commands/service";
import { createUpdateScheduler } from "./scheduler";
import { createApiServer } from "./api/server";
import { registerShutdownHandlers } from "./lifecycle";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";
const DATABASE_URL = process.env["DATABASE_URL"] ?? "./data/feedrelay.db";
const PORT = parseInt(process.env["PORT"] ?? "3000", 10);

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("feedrelay starting");

  let config: AppConfig;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    { notifier: config.notifier.kind, schedule: config.schedule.update, limits: config.limits },
    "config loaded",
  );

  const { db, close: closeDb } = createDatabase(resolve(DATABASE_URL));

  migrateDatabase(db);
  logger.info("database migrations applied");

  const store = createSubscriptionStore(db, {
    limits: config.limits,
    pageSize: config.update.pageSize,
    failureRetentionMs: config.quarantine.windowHours * 60 * 60 * 1000,
  });

  const source = createRssFeedSource({
    timeoutMs: config.update.fetchTimeoutSeconds * 1000,
    logger,
  });

  const notifier = createNotifier(config.notifier, process.env, logger);

  const scheduler = createUpdateScheduler({ store, source, notifier, logger }, config, logger);
  logger.info(
    { schedule: config.schedule.update, runOnStart: config.schedule.runOnStart },
    "update scheduler started",
  );

  const commands = createCommandService({ store, source, config, logger });
  const app = createApiServer({ commands, store, config, logger });
  const server = app.listen(PORT, () => {
    logger.info({ port: PORT }, "api server listening");
  });

  registerShutdownHandlers({
    schedulers: [scheduler],
    closeServer: () => server.close(),
    closeDb,
    logger,
  });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
