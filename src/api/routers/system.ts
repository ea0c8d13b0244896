// pattern: Imperative Shell
import { router, publicProcedure } from "../trpc";

export const systemRouter = router({
  status: publicProcedure.query(({ ctx }) => {
    return {
      feedCount: ctx.store.countFeeds(),
      subscriptionCount: ctx.store.countSubscriptions(),
      updateCron: ctx.config.schedule.update,
      limits: ctx.config.limits,
    };
  }),

  pruneOrphans: publicProcedure.mutation(({ ctx }) => {
    const removed = ctx.store.pruneOrphanFeeds();
    ctx.logger.info({ removed }, "orphan feeds pruned");
    return { removed };
  }),
});
