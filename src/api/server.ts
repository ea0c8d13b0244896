// pattern: Imperative Shell
import express from "express";
import { createExpressMiddleware } from "@trpc/server/adapters/express";
import { appRouter } from "./router";
import type { AppContext } from "./context";

/**
 * Express app serving the command procedures under `/api/trpc` and a
 * `/health` probe that also reports whether the store answers.
 * The caller decides the port.
 */
export function createApiServer(context: AppContext): express.Express {
  const app = express();

  app.use(
    "/api/trpc",
    createExpressMiddleware({
      router: appRouter,
      createContext: () => context,
      onError: ({ error, path }) => {
        if (error.code === "INTERNAL_SERVER_ERROR") {
          context.logger.error({ path, error: error.message }, "api request failed");
        }
      },
    }),
  );

  app.get("/health", (_req, res) => {
    try {
      context.store.countFeeds();
      res.json({ status: "ok" });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      context.logger.warn({ error: message }, "health check failed");
      res.status(503).json({ status: "unavailable" });
    }
  });

  return app;
}
