// pattern: Imperative Shell
import { router, publicProcedure } from "../trpc";
import { evaluateHealth } from "../../delivery/health";
import type { HealthReport } from "../../delivery/health";
import type { AppContext } from "../context";

export function healthReport(ctx: AppContext): HealthReport {
  const now = ctx.now?.() ?? new Date();
  return evaluateHealth(ctx.health.snapshot(), ctx.config.health, now);
}

export const systemRouter = router({
  status: publicProcedure.query(({ ctx }) => ({
    destination: ctx.config.delivery.destinationId,
    groups: ctx.orchestrator.states(),
    store: {
      records: ctx.store.size(),
      maxRecords: ctx.config.store.maxRecords,
      lastWriteError: ctx.store.lastWriteError(),
    },
    breaker: ctx.breakerState(),
    translation: {
      enabled: ctx.config.translation.enabled,
      provider: ctx.config.translation.provider,
      model: ctx.config.translation.model,
    },
  })),

  health: publicProcedure.query(({ ctx }) => healthReport(ctx)),
});
