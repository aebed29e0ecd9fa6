import { describe, it, expect } from "vitest";
import {
  createCircuitBreaker,
  initialBreakerState,
  recordFailure,
  recordSuccess,
  requestPermit,
} from "./circuit-breaker";
import type { CircuitBreakerOptions } from "./circuit-breaker";

const options: CircuitBreakerOptions = { failureThreshold: 3, cooldownMs: 60_000 };

describe("circuit breaker transitions", () => {
  it("should stay closed below the failure threshold", () => {
    let state = initialBreakerState;
    state = recordFailure(state, options, 1000);
    state = recordFailure(state, options, 2000);

    expect(state.state).toBe("closed");
    expect(state.failureCount).toBe(2);
    expect(requestPermit(state, options, 3000).allowed).toBe(true);
  });

  it("should open after the threshold of consecutive failures", () => {
    let state = initialBreakerState;
    for (const at of [1000, 2000, 3000]) {
      state = recordFailure(state, options, at);
    }

    expect(state).toEqual({
      state: "open",
      failureCount: 3,
      lastFailureAt: 3000,
      trialInFlight: false,
    });
  });

  it("should refuse calls while open and cooling down", () => {
    const open = { ...initialBreakerState, state: "open" as const, failureCount: 3, lastFailureAt: 3000 };

    const permit = requestPermit(open, options, 3000 + 59_999);

    expect(permit.allowed).toBe(false);
    expect(permit.next).toBe(open);
  });

  it("should admit exactly one trial once the cool-down has elapsed", () => {
    const open = { ...initialBreakerState, state: "open" as const, failureCount: 3, lastFailureAt: 3000 };

    const first = requestPermit(open, options, 63_000);
    const second = requestPermit(first.next, options, 63_001);

    expect(first.allowed).toBe(true);
    expect(first.next.state).toBe("half_open");
    expect(second.allowed).toBe(false);
  });

  it("should close and reset the count when the trial succeeds", () => {
    const halfOpen = { state: "half_open" as const, failureCount: 3, lastFailureAt: 3000, trialInFlight: true };

    const state = recordSuccess(halfOpen);

    expect(state.state).toBe("closed");
    expect(state.failureCount).toBe(0);
    expect(requestPermit(state, options, 70_000).allowed).toBe(true);
  });

  it("should reopen when the trial fails", () => {
    const halfOpen = { state: "half_open" as const, failureCount: 3, lastFailureAt: 3000, trialInFlight: true };

    const state = recordFailure(halfOpen, options, 64_000);

    expect(state.state).toBe("open");
    expect(requestPermit(state, options, 64_500).allowed).toBe(false);
    expect(requestPermit(state, options, 124_000).allowed).toBe(true);
  });

  it("should reset the failure count on any success while closed", () => {
    let state = recordFailure(initialBreakerState, options, 1000);
    state = recordFailure(state, options, 2000);
    state = recordSuccess(state);
    state = recordFailure(state, options, 3000);

    expect(state.state).toBe("closed");
    expect(state.failureCount).toBe(1);
  });
});

describe("createCircuitBreaker", () => {
  it("should track state across calls using the injected clock", () => {
    let clock = 0;
    const breaker = createCircuitBreaker(options, () => clock);

    breaker.failure();
    breaker.failure();
    breaker.failure();
    expect(breaker.permit()).toBe(false);

    clock = 60_000;
    expect(breaker.permit()).toBe(true);
    expect(breaker.permit()).toBe(false);

    breaker.success();
    expect(breaker.snapshot().state).toBe("closed");
    expect(breaker.permit()).toBe(true);
  });
});
