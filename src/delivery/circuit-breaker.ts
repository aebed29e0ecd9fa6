// pattern: Functional Core

export type BreakerStatus = "closed" | "open" | "half_open";

export type CircuitBreakerState = {
  readonly state: BreakerStatus;
  readonly failureCount: number;
  readonly lastFailureAt: number | null;
  readonly trialInFlight: boolean;
};

export type CircuitBreakerOptions = {
  readonly failureThreshold: number;
  readonly cooldownMs: number;
};

export type Permit = {
  readonly allowed: boolean;
  readonly next: CircuitBreakerState;
};

export const initialBreakerState: CircuitBreakerState = {
  state: "closed",
  failureCount: 0,
  lastFailureAt: null,
  trialInFlight: false,
};

/**
 * Decides whether a call may proceed. An open breaker stays shut until
 * `cooldownMs` has passed since the last failure, then admits exactly one
 * half-open trial; further requests are refused until that trial resolves.
 */
export function requestPermit(
  current: CircuitBreakerState,
  options: CircuitBreakerOptions,
  now: number,
): Permit {
  switch (current.state) {
    case "closed":
      return { allowed: true, next: current };
    case "open": {
      const cooledDown =
        current.lastFailureAt === null ||
        now - current.lastFailureAt >= options.cooldownMs;
      if (!cooledDown) return { allowed: false, next: current };
      return {
        allowed: true,
        next: { ...current, state: "half_open", trialInFlight: true },
      };
    }
    case "half_open":
      if (current.trialInFlight) return { allowed: false, next: current };
      return { allowed: true, next: { ...current, trialInFlight: true } };
    default: {
      const _exhaustive: never = current.state;
      throw new Error(`unknown breaker state: ${_exhaustive}`);
    }
  }
}

export function recordSuccess(current: CircuitBreakerState): CircuitBreakerState {
  return {
    state: "closed",
    failureCount: 0,
    lastFailureAt: current.lastFailureAt,
    trialInFlight: false,
  };
}

export function recordFailure(
  current: CircuitBreakerState,
  options: CircuitBreakerOptions,
  now: number,
): CircuitBreakerState {
  const failureCount = current.failureCount + 1;
  const opens =
    current.state !== "closed" || failureCount >= options.failureThreshold;
  return {
    state: opens ? "open" : "closed",
    failureCount,
    lastFailureAt: now,
    trialInFlight: false,
  };
}

/**
 * Single owner of one breaker's state for the imperative shell.
 */
export type CircuitBreaker = {
  readonly permit: () => boolean;
  readonly success: () => void;
  readonly failure: () => void;
  readonly snapshot: () => CircuitBreakerState;
};

export function createCircuitBreaker(
  options: CircuitBreakerOptions,
  now: () => number = Date.now,
): CircuitBreaker {
  let state = initialBreakerState;

  return {
    permit: () => {
      const decision = requestPermit(state, options, now());
      state = decision.next;
      return decision.allowed;
    },
    success: () => {
      state = recordSuccess(state);
    },
    failure: () => {
      state = recordFailure(state, options, now());
    },
    snapshot: () => state,
  };
}
