import { initTRPC } from "@trpc/server";
import type { AppContext } from "./context";

const t = initTRPC.context<AppContext>().create();

/**
 * Logs every failed procedure call with its path and error code. The
 * failure still reaches the caller unchanged.
 */
const logFailures = t.middleware(async ({ ctx, path, type, next }) => {
  const result = await next();
  if (!result.ok) {
    ctx.logger.warn(
      { path, type, code: result.error.code, error: result.error.message },
      "api procedure failed",
    );
  }
  return result;
});

export const router = t.router;

/** Unauthenticated; every procedure is a read-only query. */
export const publicProcedure = t.procedure.use(logFailures);

/**
 * Calls procedures directly without HTTP transport.
 */
export const createCallerFactory = t.createCallerFactory;
