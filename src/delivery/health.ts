// pattern: Functional Core
const MINUTE_MS = 60_000;
const DEFAULT_ERROR_WINDOW_MINUTES = 10;

export type ErrorStat = {
  readonly count: number;
  readonly lastAt: string;
  /** Occurrences inside the rolling window. */
  readonly recent: number;
  readonly ratePerMinute: number;
};

export type HealthSnapshot = {
  readonly startedAt: string;
  readonly consecutiveFailures: number;
  readonly lastSuccessfulFetchAt: string | null;
  readonly lastSuccessfulDeliveryAt: string | null;
  readonly errorWindowMinutes: number;
  readonly errors: Readonly<Record<string, ErrorStat>>;
};

export type HealthThresholds = {
  readonly maxConsecutiveFailures: number;
  readonly staleFetchMinutes: number;
  readonly maxErrorRatePerMinute: number;
};

export type HealthReport = {
  readonly healthy: boolean;
  readonly reasons: ReadonlyArray<string>;
  readonly snapshot: HealthSnapshot;
};

/**
 * Process-wide health counters. Consecutive failures count delivery
 * outcomes only; fetch problems surface through the error counters and the
 * stale-fetch check. Each error kind keeps a lifetime count and the
 * timestamps that fall inside the rolling window. Nothing here is persisted.
 */
export type HealthState = {
  readonly recordFetchSuccess: () => void;
  readonly recordFetchFailure: (kind: string) => void;
  readonly recordDeliverySuccess: () => void;
  readonly recordDeliveryFailure: (kind: string) => void;
  readonly recordError: (kind: string) => void;
  readonly snapshot: () => HealthSnapshot;
};

type ErrorLog = {
  count: number;
  lastAt: string;
  occurrences: Array<number>;
};

export function createHealthState(
  now: () => Date = () => new Date(),
  errorWindowMinutes: number = DEFAULT_ERROR_WINDOW_MINUTES,
): HealthState {
  const startedAt = now().toISOString();
  const windowMs = errorWindowMinutes * MINUTE_MS;
  let consecutiveFailures = 0;
  let lastSuccessfulFetchAt: string | null = null;
  let lastSuccessfulDeliveryAt: string | null = null;
  const errors = new Map<string, ErrorLog>();

  const prune = (log: ErrorLog, at: number) => {
    const cutoff = at - windowMs;
    const firstInWindow = log.occurrences.findIndex((time) => time > cutoff);
    log.occurrences.splice(0, firstInWindow === -1 ? log.occurrences.length : firstInWindow);
  };

  const recordError = (kind: string) => {
    const at = now();
    const log = errors.get(kind) ?? { count: 0, lastAt: "", occurrences: [] };
    log.count++;
    log.lastAt = at.toISOString();
    log.occurrences.push(at.getTime());
    prune(log, at.getTime());
    errors.set(kind, log);
  };

  const errorStats = (): Record<string, ErrorStat> => {
    const at = now().getTime();
    const stats: Record<string, ErrorStat> = {};
    for (const [kind, log] of errors) {
      prune(log, at);
      stats[kind] = {
        count: log.count,
        lastAt: log.lastAt,
        recent: log.occurrences.length,
        ratePerMinute: log.occurrences.length / errorWindowMinutes,
      };
    }
    return stats;
  };

  return {
    recordFetchSuccess: () => {
      lastSuccessfulFetchAt = now().toISOString();
    },
    recordFetchFailure: (kind) => {
      recordError(`fetch:${kind}`);
    },
    recordDeliverySuccess: () => {
      consecutiveFailures = 0;
      lastSuccessfulDeliveryAt = now().toISOString();
    },
    recordDeliveryFailure: (kind) => {
      consecutiveFailures++;
      recordError(`delivery:${kind}`);
    },
    recordError,
    snapshot: () => ({
      startedAt,
      consecutiveFailures,
      lastSuccessfulFetchAt,
      lastSuccessfulDeliveryAt,
      errorWindowMinutes,
      errors: errorStats(),
    }),
  };
}

/**
 * Unhealthy when delivery has failed `maxConsecutiveFailures` times in a row,
 * when no fetch has succeeded for `staleFetchMinutes` (measured from
 * startup until the first success), or when any error kind occurs more
 * often than `maxErrorRatePerMinute` across the rolling window.
 */
export function evaluateHealth(
  snapshot: HealthSnapshot,
  thresholds: HealthThresholds,
  now: Date,
): HealthReport {
  const reasons: Array<string> = [];

  if (snapshot.consecutiveFailures >= thresholds.maxConsecutiveFailures) {
    reasons.push(
      `${snapshot.consecutiveFailures} consecutive delivery failures`,
    );
  }

  const lastFetch = Date.parse(snapshot.lastSuccessfulFetchAt ?? snapshot.startedAt);
  const staleMs = thresholds.staleFetchMinutes * MINUTE_MS;
  if (now.getTime() - lastFetch > staleMs) {
    reasons.push(
      snapshot.lastSuccessfulFetchAt
        ? `no successful fetch since ${snapshot.lastSuccessfulFetchAt}`
        : `no successful fetch since startup at ${snapshot.startedAt}`,
    );
  }

  for (const [kind, stat] of Object.entries(snapshot.errors)) {
    if (stat.ratePerMinute > thresholds.maxErrorRatePerMinute) {
      reasons.push(
        `high ${kind} error rate: ${stat.ratePerMinute}/min over ${snapshot.errorWindowMinutes} min`,
      );
    }
  }

  return { healthy: reasons.length === 0, reasons, snapshot };
}
