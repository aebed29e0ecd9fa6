// pattern: Imperative Shell
import express from "express";
import { createExpressMiddleware } from "@trpc/server/adapters/express";
import { appRouter } from "./router";
import { healthReport } from "./routers/system";
import type { AppContext } from "./context";
import type { HealthReport } from "../delivery/health";

export function healthResponse(report: HealthReport) {
  return {
    statusCode: report.healthy ? 200 : 503,
    body: {
      status: report.healthy ? "ok" : "unhealthy",
      reasons: report.reasons,
      ...report.snapshot,
    },
  };
}

/**
 * Creates the Express app: tRPC under `/api/trpc`, and `/health` answering
 * 200 or 503 from the current health report for external monitors.
 * The caller decides the port.
 */
export function createApiServer(context: AppContext): express.Express {
  const app = express();

  app.use(
    "/api/trpc",
    createExpressMiddleware({
      router: appRouter,
      createContext: () => context,
    }),
  );

  app.get("/health", (_req, res) => {
    const { statusCode, body } = healthResponse(healthReport(context));
    res.status(statusCode).json(body);
  });

  return app;
}
