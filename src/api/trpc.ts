import { initTRPC, TRPCError } from "@trpc/server";
import { StoreError } from "../errors";
import type { AppContext } from "./context";

const t = initTRPC.context<AppContext>().create();

/**
 * tRPC router factory for creating nested route definitions.
 */
export const router = t.router;

/**
 * Procedure factory for every API call. Store failures are logged and
 * reported to the caller as a generic backend error.
 */
export const publicProcedure = t.procedure.use(async ({ ctx, path, next }) => {
  const result = await next();
  if (!result.ok && result.error.cause instanceof StoreError) {
    const cause = result.error.cause;
    ctx.logger.error({ path, error: cause.message, details: cause.details }, "store error");
    throw new TRPCError({ code: "INTERNAL_SERVER_ERROR", message: "backend error", cause });
  }
  return result;
});

/**
 * tRPC caller factory for calling procedures directly without HTTP transport.
 * Useful for testing procedures in isolation.
 */
export const createCallerFactory = t.createCallerFactory;
