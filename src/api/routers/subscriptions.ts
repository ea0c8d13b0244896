// pattern: Imperative Shell
import { z } from "zod";
import { router, publicProcedure } from "../trpc";

const id = z.string().trim().min(1);

/**
 * tRPC router for the subscription commands: subscribe a destination to a
 * feed, list its feeds by position, and unsubscribe by position.
 */
export const subscriptionsRouter = router({
  subscribe: publicProcedure
    .input(
      z.object({
        ownerId: id,
        destinationId: id,
        url: z.string().trim().min(1),
      }),
    )
    .mutation(({ ctx, input }) => ctx.commands.subscribe(input)),

  list: publicProcedure
    .input(z.object({ destinationId: id }))
    .query(({ ctx, input }) => ctx.commands.listSubscriptions(input.destinationId)),

  unsubscribe: publicProcedure
    .input(
      z.object({
        ownerId: id,
        destinationId: id,
        position: z.number().int().positive(),
      }),
    )
    .mutation(({ ctx, input }) => ctx.commands.unsubscribe(input)),
});
