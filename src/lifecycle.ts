// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * Anything the shutdown sequence has to stop before the database closes.
 */
export type Stoppable = {
  readonly stop: () => void;
};

export type ShutdownDeps = {
  readonly schedulers: ReadonlyArray<Stoppable>;
  readonly closeServer: () => void;
  readonly closeDb: () => void;
  readonly logger: Logger;
};

function attempt(logger: Logger, step: string, fn: () => void): void {
  try {
    fn();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ step, error: message }, "shutdown step failed");
  }
}

/**
 * Creates the shutdown routine: stop schedulers (which aborts a running
 * update pass), stop accepting API requests, close the database, exit.
 * Every step runs even if an earlier one throws; repeat calls are ignored.
 */
export function createShutdown(deps: ShutdownDeps): (signal: string) => void {
  let shuttingDown = false;

  return (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const scheduler of deps.schedulers) {
      attempt(deps.logger, "stop scheduler", () => scheduler.stop());
    }
    attempt(deps.logger, "close api server", deps.closeServer);
    attempt(deps.logger, "close database", () => {
      deps.closeDb();
      deps.logger.info("database connection closed");
    });

    deps.logger.info("shutdown complete");
    process.exit(0);
  };
}

/**
 * Registers SIGTERM and SIGINT handlers that run the shutdown routine.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  const shutdown = createShutdown(deps);
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}
