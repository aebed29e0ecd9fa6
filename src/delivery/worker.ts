// pattern: Imperative Shell
import pLimit from "p-limit";
import type { Logger } from "pino";
import { sleep as defaultSleep } from "../shared/sleep";
import type { Sleep } from "../shared/sleep";
import type { CircuitBreaker, CircuitBreakerState } from "./circuit-breaker";
import type { HealthState } from "./health";
import type { DeliveryTarget, TargetErrorKind, TargetOutcome } from "./target";

export type DeliveryFailureKind =
  | "transient"
  | "rateLimited"
  | "permanent"
  | "circuitOpen";

export type DeliveryMessage = {
  readonly text: string;
  readonly imageUrl: string | null;
};

export type DeliveryResult =
  | { readonly ok: true; readonly attempts: number }
  | {
      readonly ok: false;
      readonly kind: DeliveryFailureKind;
      readonly attempts: number;
      readonly error: string;
    };

export type DeliveryWorkerOptions = {
  readonly destinationId: string;
  readonly maxRetries: number;
  readonly backoffBaseMs: number;
  readonly backoffFactor: number;
  readonly minIntervalMs: number;
};

export type DeliveryWorkerDeps = {
  readonly target: DeliveryTarget;
  readonly options: DeliveryWorkerOptions;
  readonly breaker: CircuitBreaker;
  readonly health: HealthState;
  readonly logger: Logger;
  readonly signal?: AbortSignal;
  readonly sleep?: Sleep;
  readonly now?: () => number;
};

export type DeliveryWorker = {
  readonly deliver: (message: DeliveryMessage) => Promise<DeliveryResult>;
  readonly breakerState: () => CircuitBreakerState;
};

const FAILURE_KINDS: Readonly<Record<TargetErrorKind, DeliveryFailureKind>> = {
  rate_limited: "rateLimited",
  transient_network: "transient",
  permanent_rejection: "permanent",
};

/**
 * Delay before retry number `retry` (1-based): `base * factor^(retry - 1)`,
 * raised to the target's retry-after hint when it sent one.
 */
export function retryDelay(
  retry: number,
  options: DeliveryWorkerOptions,
  retryAfterSeconds?: number,
): number {
  const computed = options.backoffBaseMs * options.backoffFactor ** (retry - 1);
  if (retryAfterSeconds === undefined) return computed;
  return Math.max(computed, retryAfterSeconds * 1000);
}

/**
 * Shared delivery path for every source group. Calls run one at a time,
 * spaced at least `minIntervalMs` apart, behind one circuit breaker.
 * Transient and rate-limited failures are retried up to `maxRetries` times;
 * permanent rejections are returned immediately and leave a closed breaker
 * untouched.
 */
export function createDeliveryWorker(deps: DeliveryWorkerDeps): DeliveryWorker {
  const { target, options, breaker, health, logger, signal } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const now = deps.now ?? Date.now;
  const queue = pLimit(1);

  let lastSentAt: number | null = null;

  const send = async (message: DeliveryMessage): Promise<TargetOutcome> => {
    if (lastSentAt !== null) {
      const wait = options.minIntervalMs - (now() - lastSentAt);
      if (wait > 0) await sleep(wait, signal);
    }
    try {
      return await target(options.destinationId, message.text, message.imageUrl);
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      return { ok: false, errorKind: "transient_network", error };
    } finally {
      lastSentAt = now();
    }
  };

  const attempt = async (message: DeliveryMessage): Promise<DeliveryResult> => {
    if (signal?.aborted) {
      return { ok: false, kind: "transient", attempts: 0, error: "delivery cancelled" };
    }

    if (!breaker.permit()) {
      health.recordDeliveryFailure("circuitOpen");
      logger.warn("circuit breaker open, delivery skipped");
      return { ok: false, kind: "circuitOpen", attempts: 0, error: "circuit breaker open" };
    }

    let attempts = 0;
    let kind: DeliveryFailureKind = "transient";
    let error = "delivery not attempted";
    let retryAfterSeconds: number | undefined;

    for (let retry = 0; retry <= options.maxRetries; retry++) {
      if (retry > 0) {
        const delayMs = retryDelay(retry, options, retryAfterSeconds);
        logger.info({ retry, delayMs, kind }, "retrying delivery");
        await sleep(delayMs, signal);
        if (signal?.aborted) break;
      }

      attempts++;
      const outcome = await send(message);

      if (outcome.ok) {
        breaker.success();
        health.recordDeliverySuccess();
        return { ok: true, attempts };
      }

      kind = FAILURE_KINDS[outcome.errorKind];
      error = outcome.error;
      retryAfterSeconds = outcome.retryAfterSeconds;

      if (kind === "permanent") {
        // a refused half-open trial reopens the breaker; otherwise it is left as is
        if (breaker.snapshot().state === "half_open") breaker.failure();
        health.recordDeliveryFailure(kind);
        logger.error(
          { error, attempts },
          "delivery rejected as non-recoverable, not retrying",
        );
        return { ok: false, kind, attempts, error };
      }

      logger.warn({ kind, error, attempt: attempts }, "delivery attempt failed");
    }

    breaker.failure();
    health.recordDeliveryFailure(kind);
    logger.error(
      { kind, error, attempts, breaker: breaker.snapshot().state },
      "delivery failed after retries",
    );
    return { ok: false, kind, attempts, error };
  };

  return {
    deliver: (message) => queue(() => attempt(message)),
    breakerState: () => breaker.snapshot(),
  };
}
