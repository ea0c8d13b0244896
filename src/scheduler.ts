import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import type { AppConfig } from "./config";
import { runUpdatePass } from "./engine";
import type { UpdateDeps, UpdatePassResult, UpdateSettings } from "./engine";

export type UpdateScheduler = {
  readonly stop: () => void;
  /**
   * Starts a pass now unless one is already running. Resolves with the
   * pass result, or null when the call was skipped.
   */
  readonly runNow: () => Promise<UpdatePassResult | null>;
};

export function updateSettingsFrom(config: AppConfig): UpdateSettings {
  return {
    passTimeoutMs: config.update.passTimeoutSeconds * 1000,
    quarantine: {
      windowMs: config.quarantine.windowHours * 60 * 60 * 1000,
      failureThreshold: config.quarantine.failureThreshold,
      notifyConcurrency: config.quarantine.notifyConcurrency,
    },
  };
}

/**
 * Creates and starts a scheduler that runs update passes on the
 * `schedule.update` cron expression.
 *
 * Passes never overlap: a tick that arrives while a pass is still running is
 * skipped, and the next tick fires on schedule regardless of how long the
 * previous pass took. `stop()` halts the cron task and aborts the running
 * pass through its shutdown signal.
 *
 * @param deps - Store, feed source, notifier and logger for the update engine
 * @param config - Application configuration (schedule and pass settings)
 * @param logger - Logger for scheduling events
 */
export function createUpdateScheduler(
  deps: Omit<UpdateDeps, "settings">,
  config: AppConfig,
  logger: Logger,
): UpdateScheduler {
  const shutdown = new AbortController();
  const settings = updateSettingsFrom(config);
  let running: Promise<UpdatePassResult> | null = null;

  const runNow = async (): Promise<UpdatePassResult | null> => {
    if (shutdown.signal.aborted) return null;
    if (running) {
      logger.warn("previous update pass still running, skipping tick");
      return null;
    }

    running = runUpdatePass({ ...deps, settings }, shutdown.signal);
    try {
      return await running;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "update pass failed unexpectedly");
      return null;
    } finally {
      running = null;
    }
  };

  const task: ScheduledTask = cron.schedule(config.schedule.update, async () => {
    await runNow();
  });

  if (config.schedule.runOnStart) {
    void runNow();
  }

  return {
    stop: () => {
      task.stop();
      shutdown.abort();
    },
    runNow,
  };
}
