// pattern: Imperative Shell
import type { Logger } from "pino";
import type { StopOptions } from "./scheduler";

/**
 * Anything that drains its work when asked to stop. The orchestrator stops
 * its timers, waits up to the grace period and flushes the dedup store.
 */
export type Drainable = {
  readonly stop: (options: StopOptions) => Promise<void>;
};

export type ShutdownDeps = {
  readonly orchestrator: Drainable;
  readonly graceMs: number;
  readonly closeServer: () => Promise<void>;
  readonly logger: Logger;
};

/**
 * Registers SIGTERM and SIGINT handlers for graceful shutdown and returns
 * the shutdown routine itself.
 *
 * - Re-entrant signals are ignored once shutdown has begun
 * - The orchestrator drains before the HTTP server closes
 * - Each step has its own try/catch so later steps still run
 * - Ends with `process.exit(0)`
 */
export function registerShutdownHandlers(
  deps: ShutdownDeps,
): (signal: string) => Promise<void> {
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal, graceMs: deps.graceMs }, "shutdown signal received");

    try {
      await deps.orchestrator.stop({ graceMs: deps.graceMs });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "error stopping orchestrator");
    }

    try {
      await deps.closeServer();
      deps.logger.info("http server closed");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "error closing http server");
    }

    deps.logger.info("shutdown complete");
    process.exit(0);
  };

  const handle = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.fatal({ error: message }, "shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => handle("SIGTERM"));
  process.on("SIGINT", () => handle("SIGINT"));

  return shutdown;
}
