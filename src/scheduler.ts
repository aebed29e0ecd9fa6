// pattern: Imperative Shell
import cron from "node-cron";
import { runGroupCycle } from "./pipeline/cycle";
import type { CycleDeps, CycleReport, GroupPhase } from "./pipeline/cycle";
import { sleep as defaultSleep } from "./shared/sleep";
import type { GroupConfig } from "./config";

export type GroupState = {
  readonly group: string;
  readonly schedule: string;
  readonly phase: GroupPhase;
  readonly cycles: number;
  readonly skippedTicks: number;
  readonly lastStartedAt: string | null;
  readonly lastReport: CycleReport | null;
};

export type GroupTask = {
  readonly stop: () => void;
};

export type ScheduleTask = (expression: string, run: () => Promise<void>) => GroupTask;

const scheduleWithCron: ScheduleTask = (expression, run) =>
  cron.schedule(expression, async () => {
    await run();
  });

export type OrchestratorDeps = Omit<CycleDeps, "claims" | "signal" | "onPhase"> & {
  /** Aborted when shutdown gives up waiting; share it with the delivery worker. */
  readonly shutdown?: AbortController;
  readonly runCycle?: typeof runGroupCycle;
  readonly scheduleTask?: ScheduleTask;
};

export type StopOptions = {
  readonly graceMs: number;
};

export type Orchestrator = {
  readonly states: () => ReadonlyArray<GroupState>;
  /** Runs a group immediately. Resolves to null when the group is busy or stopping. */
  readonly runNow: (groupName: string) => Promise<CycleReport | null>;
  readonly stop: (options: StopOptions) => Promise<void>;
};

type GroupRuntime = {
  readonly config: GroupConfig;
  phase: GroupPhase;
  cycles: number;
  skippedTicks: number;
  lastStartedAt: string | null;
  lastReport: CycleReport | null;
  inFlight: Promise<CycleReport | null> | null;
};

/**
 * Starts one cron task per configured group. Groups share the dedup store,
 * the delivery worker and a set of in-flight article ids, so two groups
 * never deliver the same article at once. A finished group sleeps until
 * its next tick or a manual run wakes it back to idle; a tick is skipped
 * while the previous cycle of the same group is still running.
 */
export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const { config, logger, store } = deps;
  const shutdown = deps.shutdown ?? new AbortController();
  const runCycle = deps.runCycle ?? runGroupCycle;
  const scheduleTask = deps.scheduleTask ?? scheduleWithCron;
  const sleep = deps.sleep ?? defaultSleep;
  const now = deps.now ?? (() => new Date());
  const claims = new Set<string>();

  let stopping = false;
  const runtimes = new Map<string, GroupRuntime>();
  const tasks: Array<GroupTask> = [];

  const execute = (runtime: GroupRuntime, trigger: "timer" | "manual") => {
    const groupLogger = logger.child({ group: runtime.config.name });

    if (!stopping && runtime.phase === "sleeping") {
      runtime.phase = "idle";
      groupLogger.debug({ trigger }, "group waking");
    }

    if (stopping || runtime.phase !== "idle") {
      runtime.skippedTicks++;
      groupLogger.warn(
        { trigger, phase: runtime.phase, stopping },
        "group busy, cycle skipped",
      );
      return Promise.resolve(null);
    }

    runtime.phase = "fetching";
    runtime.lastStartedAt = now().toISOString();
    groupLogger.info({ trigger }, "group cycle starting");

    const cycle = (async (): Promise<CycleReport | null> => {
      try {
        const report = await runCycle(runtime.config, {
          ...deps,
          claims,
          signal: shutdown.signal,
          onPhase: (phase) => {
            runtime.phase = phase;
          },
        });
        runtime.lastReport = report;
        return report;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.health.recordError("cycle:unexpected");
        groupLogger.error({ error: message }, "group cycle failed unexpectedly");
        return null;
      } finally {
        runtime.cycles++;
        runtime.phase = stopping ? "idle" : "sleeping";
      }
    })();

    runtime.inFlight = cycle;
    return cycle;
  };

  for (const group of config.groups) {
    const runtime: GroupRuntime = {
      config: group,
      phase: "idle",
      cycles: 0,
      skippedTicks: 0,
      lastStartedAt: null,
      lastReport: null,
      inFlight: null,
    };
    runtimes.set(group.name, runtime);

    tasks.push(
      scheduleTask(group.schedule, async () => {
        await execute(runtime, "timer");
      }),
    );
    logger.info({ group: group.name, schedule: group.schedule }, "group scheduled");
  }

  return {
    states: () =>
      [...runtimes.values()].map((runtime) => ({
        group: runtime.config.name,
        schedule: runtime.config.schedule,
        phase: runtime.phase,
        cycles: runtime.cycles,
        skippedTicks: runtime.skippedTicks,
        lastStartedAt: runtime.lastStartedAt,
        lastReport: runtime.lastReport,
      })),

    runNow: (groupName) => {
      const runtime = runtimes.get(groupName);
      if (!runtime) {
        return Promise.reject(new Error(`unknown group: ${groupName}`));
      }
      return execute(runtime, "manual");
    },

    stop: async ({ graceMs }) => {
      if (stopping) return;
      stopping = true;

      for (const task of tasks) {
        task.stop();
      }

      const pending = [...runtimes.values()].flatMap((runtime) =>
        runtime.inFlight ? [runtime.inFlight] : [],
      );

      if (pending.length > 0) {
        logger.info({ inFlight: pending.length, graceMs }, "waiting for in-flight cycles");
        const graceTimer = new AbortController();
        let settled = false;
        await Promise.race([
          Promise.all(pending).then(() => {
            settled = true;
          }),
          sleep(graceMs, graceTimer.signal),
        ]);
        graceTimer.abort();
        if (!settled) {
          logger.warn({ graceMs }, "grace period elapsed, cancelling in-flight work");
        }
      }

      shutdown.abort();
      await Promise.all(pending);

      for (const runtime of runtimes.values()) {
        runtime.phase = "idle";
      }

      const flushed = await store.flush();
      logger.info({ flushed, records: store.size() }, "orchestrator stopped");
    },
  };
}
