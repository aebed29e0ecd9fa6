// pattern: Imperative Shell
import { router } from "./trpc";
import { articlesRouter } from "./routers/articles";
import { systemRouter } from "./routers/system";

/**
 * Root tRPC router: relay status, health and recently delivered articles.
 */
export const appRouter = router({
  articles: articlesRouter,
  system: systemRouter,
});

export type AppRouter = typeof appRouter;
