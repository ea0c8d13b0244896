// pattern: Imperative Shell
import { router } from "./trpc";
import { subscriptionsRouter } from "./routers/subscriptions";
import { systemRouter } from "./routers/system";

/**
 * Root tRPC router combining the subscription commands and system status.
 */
export const appRouter = router({
  subscriptions: subscriptionsRouter,
  system: systemRouter,
});

/**
 * Inferred type of the root tRPC router.
 * Used for type-safe client code generation and caller factory typing.
 */
export type AppRouter = typeof appRouter;
