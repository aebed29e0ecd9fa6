// pattern: Functional Core
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { DedupStore } from "../store/dedup-store";
import type { HealthState } from "../delivery/health";
import type { CircuitBreakerState } from "../delivery/circuit-breaker";
import type { Orchestrator } from "../scheduler";

/**
 * tRPC context type passed to all procedures. Everything here is shared with
 * the running pipeline; procedures only read from it.
 */
export type AppContext = {
  readonly config: AppConfig;
  readonly store: Pick<DedupStore, "size" | "recent" | "lastWriteError">;
  readonly health: Pick<HealthState, "snapshot">;
  readonly orchestrator: Pick<Orchestrator, "states">;
  readonly breakerState: () => CircuitBreakerState;
  readonly logger: Logger;
  readonly now?: () => Date;
};
