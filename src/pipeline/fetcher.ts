// pattern: Imperative Shell
import type { Logger } from "pino";
import type { FetchStrategyConfig } from "../config";
import { sleep as defaultSleep } from "../shared/sleep";
import type { Sleep } from "../shared/sleep";
import { timeoutSignal } from "../shared/abort";
import type { FetchErrorClass, FetchResult } from "./types";

export type FetchStrategy = FetchStrategyConfig & {
  readonly name: string;
};

export type UserAgentMode = FetchStrategyConfig["userAgent"];

const DESKTOP_AGENTS: ReadonlyArray<string> = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15",
  "Mozilla/5.0 (X11; Linux x86_64; rv:125.0) Gecko/20100101 Firefox/125.0",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36 Edg/124.0.0.0",
];

const MOBILE_AGENT =
  "Mozilla/5.0 (iPhone; CPU iPhone OS 17_4 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Mobile/15E148 Safari/604.1";

const BOT_AGENT = "Mozilla/5.0 (compatible; NewswireRelay/1.0)";

const DEFAULT_ACCEPT =
  "text/html,application/xhtml+xml,application/rss+xml,application/xml;q=0.9,*/*;q=0.8";

/**
 * Shared request identity. The desktop user agent changes after every
 * `rotateAfter` requests.
 */
export type FetchSession = {
  readonly userAgent: (mode: UserAgentMode) => string;
  readonly requestCount: () => number;
};

export function createFetchSession(
  rotateAfter: number,
  random: () => number = Math.random,
): FetchSession {
  let count = 0;
  let agentIndex = Math.floor(random() * DESKTOP_AGENTS.length);

  return {
    userAgent: (mode) => {
      count++;
      if (count > rotateAfter) {
        count = 1;
        agentIndex = (agentIndex + 1) % DESKTOP_AGENTS.length;
      }
      if (mode === "mobile") return MOBILE_AGENT;
      if (mode === "bot") return BOT_AGENT;
      return DESKTOP_AGENTS[agentIndex] ?? BOT_AGENT;
    },
    requestCount: () => count,
  };
}

export type FetchChainOptions = {
  readonly minPayloadBytes: number;
  readonly backoffBaseMs: number;
  readonly backoffMaxMs: number;
  readonly session: FetchSession;
  readonly logger: Logger;
  readonly signal?: AbortSignal;
  readonly sleep?: Sleep;
  readonly random?: () => number;
};

/**
 * Delay before the strategy that follows `attempt` (zero-based):
 * exponential in the attempt, capped, with up to 50% jitter removed.
 */
export function backoffDelay(
  attempt: number,
  baseMs: number,
  maxMs: number,
  random: () => number = Math.random,
): number {
  const ceiling = Math.min(maxMs, baseMs * 2 ** attempt);
  return Math.round(ceiling * (0.5 + random() * 0.5));
}

export function applyRewrite(url: string, strategy: FetchStrategy): string {
  if (!strategy.rewrite) return url;
  return url.replace(
    new RegExp(strategy.rewrite.pattern),
    strategy.rewrite.replacement,
  );
}

type AttemptOutcome =
  | { readonly ok: true; readonly payload: string }
  | { readonly ok: false; readonly errorClass: FetchErrorClass; readonly error: string };

async function attemptStrategy(
  url: string,
  strategy: FetchStrategy,
  options: FetchChainOptions,
): Promise<AttemptOutcome> {
  try {
    const response = await fetch(url, {
      signal: timeoutSignal(strategy.timeoutMs, options.signal),
      headers: {
        Accept: DEFAULT_ACCEPT,
        "Accept-Language": "en-US,en;q=0.9",
        "User-Agent": options.session.userAgent(strategy.userAgent),
        ...strategy.headers,
      },
    });

    if (!response.ok) {
      return {
        ok: false,
        errorClass: "rejected",
        error: `HTTP ${response.status}: ${response.statusText}`,
      };
    }

    const payload = await response.text();
    const bytes = Buffer.byteLength(payload, "utf-8");
    if (bytes < options.minPayloadBytes) {
      return {
        ok: false,
        errorClass: "empty",
        error: `payload of ${bytes} bytes is below ${options.minPayloadBytes}`,
      };
    }

    return { ok: true, payload };
  } catch (err) {
    if (options.signal?.aborted) {
      return { ok: false, errorClass: "timeout", error: "fetch cancelled" };
    }
    const message = err instanceof Error ? err.message : String(err);
    const timedOut =
      err instanceof Error &&
      (err.name === "TimeoutError" || err.name === "AbortError");
    return {
      ok: false,
      errorClass: timedOut ? "timeout" : "rejected",
      error: message,
    };
  }
}

/**
 * Runs `strategies` in order against `url` until one returns HTTP 200 with a
 * payload of at least `minPayloadBytes`. Later strategies are not invoked
 * after a success. Exhausting the chain is reported as a failure carrying the
 * last error class; this function never throws.
 */
export async function fetchWithStrategies(
  url: string,
  strategies: ReadonlyArray<FetchStrategy>,
  options: FetchChainOptions,
): Promise<FetchResult> {
  const sleep = options.sleep ?? defaultSleep;
  const random = options.random ?? Math.random;

  let lastClass: FetchErrorClass = "rejected";
  let lastError = "no fetch strategies configured";

  for (const [index, strategy] of strategies.entries()) {
    if (index > 0) {
      const delayMs = backoffDelay(
        index - 1,
        options.backoffBaseMs,
        options.backoffMaxMs,
        random,
      );
      await sleep(delayMs, options.signal);
    }

    if (options.signal?.aborted) {
      lastClass = "timeout";
      lastError = "fetch cancelled";
      break;
    }

    const target = applyRewrite(url, strategy);
    const outcome = await attemptStrategy(target, strategy, options);

    if (outcome.ok) {
      options.logger.debug(
        {
          url: target,
          strategy: strategy.name,
          bytes: Buffer.byteLength(outcome.payload, "utf-8"),
        },
        "fetch strategy succeeded",
      );
      return {
        success: true,
        payload: outcome.payload,
        strategy: strategy.name,
        url: target,
      };
    }

    lastClass = outcome.errorClass;
    lastError = outcome.error;
    options.logger.debug(
      {
        url: target,
        strategy: strategy.name,
        errorClass: outcome.errorClass,
        error: outcome.error,
      },
      "fetch strategy failed",
    );
  }

  options.logger.warn(
    { url, errorClass: lastClass, error: lastError },
    "all fetch strategies exhausted",
  );
  return { success: false, errorClass: lastClass, error: lastError, url };
}
