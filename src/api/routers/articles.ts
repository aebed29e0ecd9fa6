// pattern: Imperative Shell
import { z } from "zod/v3";
import { router, publicProcedure } from "../trpc";

/**
 * Read access to the dedup history, newest first.
 */
export const articlesRouter = router({
  recent: publicProcedure
    .input(
      z
        .object({
          limit: z.number().int().positive().max(100).default(20),
        })
        .default({}),
    )
    .query(({ ctx, input }) => ctx.store.recent(input.limit)),
});
