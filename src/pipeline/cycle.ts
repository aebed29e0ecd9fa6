// pattern: Imperative Shell
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { AppConfig, GroupConfig, SourceConfig } from "../config";
import type { DedupStore } from "../store/dedup-store";
import type { DeliveryWorker } from "../delivery/worker";
import type { HealthState } from "../delivery/health";
import { formatMessage } from "../delivery/formatter";
import { contextHint, translateWithFallback } from "../llm/translator";
import type { Translator } from "../llm/translator";
import { createAdapter } from "./adapter";
import { fetchWithStrategies } from "./fetcher";
import type { FetchSession, FetchStrategy } from "./fetcher";
import { filterArticles, policyForSource } from "./filter";
import type { Sleep } from "../shared/sleep";
import type { Article, DropReason } from "./types";

export type GroupPhase = "idle" | "fetching" | "filtering" | "delivering" | "sleeping";

export type CycleDeps = {
  readonly config: AppConfig;
  readonly store: DedupStore;
  readonly worker: DeliveryWorker;
  readonly health: HealthState;
  readonly session: FetchSession;
  readonly logger: Logger;
  /** Ids currently being delivered by any group. */
  readonly claims: Set<string>;
  readonly translator: Translator | null;
  readonly signal?: AbortSignal;
  readonly sleep?: Sleep;
  readonly now?: () => Date;
  readonly onPhase?: (phase: GroupPhase) => void;
};

export type SourceReport = {
  readonly source: string;
  readonly fetched: number;
  readonly skipped: number;
  readonly errors: ReadonlyArray<string>;
};

export type CycleReport = {
  readonly group: string;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly sources: ReadonlyArray<SourceReport>;
  readonly usedFallback: boolean;
  readonly dropped: Readonly<Record<DropReason, number>>;
  readonly queued: number;
  readonly delivered: number;
  readonly failed: number;
  readonly cancelled: boolean;
};

type SourceBatch = {
  readonly source: SourceConfig;
  readonly articles: ReadonlyArray<Article>;
  readonly report: SourceReport;
};

/**
 * Resolves a source's strategy chain by name, falling back to the chain
 * configured for its kind. Unknown names are rejected at config load.
 */
export function resolveStrategies(
  source: SourceConfig,
  fetch: AppConfig["fetch"],
): Array<FetchStrategy> {
  const names = source.strategies ?? fetch.chains[source.kind];
  return names.flatMap((name) => {
    const strategy = fetch.strategies[name];
    return strategy ? [{ ...strategy, name }] : [];
  });
}

/**
 * Fetches and parses every endpoint of one source in order. A failed
 * endpoint is recorded and skipped; it never fails the source.
 */
export async function fetchSource(
  source: SourceConfig,
  deps: CycleDeps,
): Promise<SourceBatch> {
  const { config, health, session, signal, sleep } = deps;
  const logger = deps.logger.child({ source: source.name });
  const adapter = createAdapter(source);
  const strategies = resolveStrategies(source, config.fetch);

  const articles: Array<Article> = [];
  const errors: Array<string> = [];
  let skipped = 0;

  for (const endpoint of source.endpoints) {
    const result = await fetchWithStrategies(endpoint, strategies, {
      minPayloadBytes: config.fetch.minPayloadBytes[source.kind],
      backoffBaseMs: config.fetch.backoffBaseMs,
      backoffMaxMs: config.fetch.backoffMaxMs,
      session,
      logger,
      signal,
      sleep,
    });

    if (!result.success) {
      health.recordFetchFailure(result.errorClass);
      errors.push(`${endpoint}: ${result.errorClass}: ${result.error}`);
      continue;
    }

    health.recordFetchSuccess();
    const parsed = await adapter.parse(result.payload, {
      sourceName: source.name,
      section: source.section,
      pageUrl: result.url,
    });

    skipped += parsed.skipped;
    if (parsed.error) {
      health.recordError("parse:malformed");
      errors.push(`${endpoint}: ${parsed.error}`);
      logger.warn({ endpoint, error: parsed.error }, "source payload could not be parsed");
      continue;
    }

    articles.push(...parsed.articles);
  }

  logger.info(
    { fetched: articles.length, skipped, failedEndpoints: errors.length },
    "source fetched",
  );

  return {
    source,
    articles,
    report: { source: source.name, fetched: articles.length, skipped, errors },
  };
}

async function fetchSources(
  sources: ReadonlyArray<SourceConfig>,
  concurrency: number,
  deps: CycleDeps,
): Promise<Array<SourceBatch>> {
  const limit = pLimit(concurrency);
  return Promise.all(
    sources
      .filter((source) => source.enabled)
      .map((source) =>
        limit(async (): Promise<SourceBatch> => {
          try {
            return await fetchSource(source, deps);
          } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            deps.health.recordFetchFailure("rejected");
            deps.logger.error(
              { source: source.name, error: message },
              "unexpected error while fetching source",
            );
            return {
              source,
              articles: [],
              report: { source: source.name, fetched: 0, skipped: 0, errors: [message] },
            };
          }
        }),
      ),
  );
}

/**
 * Runs one Fetching, Filtering, Delivering pass for a group. Articles are
 * committed to the store only after a successful delivery, so a failed one
 * is offered again next cycle. Never throws.
 */
export async function runGroupCycle(
  group: GroupConfig,
  deps: CycleDeps,
): Promise<CycleReport> {
  const { config, store, worker, claims, translator, signal } = deps;
  const now = deps.now ?? (() => new Date());
  const logger = deps.logger.child({ group: group.name });
  const startedAt = now().toISOString();
  const scoped: CycleDeps = { ...deps, logger };

  deps.onPhase?.("fetching");
  let batches = await fetchSources(group.sources, group.fetchConcurrency, scoped);
  let usedFallback = false;

  const fetchedCount = (list: ReadonlyArray<SourceBatch>) =>
    list.reduce((sum, batch) => sum + batch.articles.length, 0);

  if (fetchedCount(batches) === 0 && group.fallbackSources.length > 0) {
    logger.warn(
      { fallbackSources: group.fallbackSources.length },
      "primary sources returned nothing, trying fallback sources",
    );
    usedFallback = true;
    batches = [
      ...batches,
      ...(await fetchSources(group.fallbackSources, group.fetchConcurrency, scoped)),
    ];
  }

  deps.onPhase?.("filtering");
  const dropped: Record<DropReason, number> = { irrelevant: 0, stale: 0, duplicate: 0 };
  const seen = new Set<string>();
  const queue: Array<Article> = [];
  const filterTime = now();

  for (const batch of batches) {
    const policy = policyForSource(batch.source, config.relevance);
    const filtered = filterArticles(batch.articles, policy, filterTime);
    dropped.irrelevant += filtered.dropped.irrelevant;
    dropped.stale += filtered.dropped.stale;

    let taken = 0;
    for (const article of filtered.kept) {
      if (seen.has(article.id) || store.has(article.id) || claims.has(article.id)) {
        dropped.duplicate++;
        continue;
      }
      seen.add(article.id);
      if (taken >= batch.source.maxArticlesPerCycle) continue;
      if (queue.length >= config.pipeline.maxArticlesPerCycle) continue;
      queue.push(article);
      taken++;
    }
  }

  logger.info(
    { fetched: fetchedCount(batches), queued: queue.length, dropped },
    "articles filtered",
  );

  deps.onPhase?.("delivering");
  let delivered = 0;
  let failed = 0;
  let cancelled = false;

  for (const [index, article] of queue.entries()) {
    if (signal?.aborted) {
      cancelled = true;
      logger.info({ remaining: queue.length - index }, "shutdown requested, stopping delivery");
      break;
    }

    // another group may have delivered or claimed it since filtering
    if (store.has(article.id) || claims.has(article.id)) {
      dropped.duplicate++;
      continue;
    }

    claims.add(article.id);
    try {
      const headline =
        translator && config.translation.enabled
          ? await translateWithFallback(
              translator,
              article.title,
              contextHint(article.title, article.summary),
              config.translation,
              logger,
            )
          : article.title;

      const message = formatMessage(article, headline, {
        ...config.message,
        html: config.delivery.parseMode === "HTML",
      });
      const result = await worker.deliver(message);

      if (result.ok) {
        await store.commit(article);
        delivered++;
        logger.info(
          { articleId: article.id, source: article.sourceName, attempts: result.attempts },
          "article delivered",
        );
      } else {
        failed++;
        logger.warn(
          { articleId: article.id, kind: result.kind, error: result.error },
          "article delivery failed, will retry next cycle",
        );
      }
    } catch (err) {
      failed++;
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ articleId: article.id, error: message }, "unexpected error delivering article");
    } finally {
      claims.delete(article.id);
    }
  }

  const report: CycleReport = {
    group: group.name,
    startedAt,
    finishedAt: now().toISOString(),
    sources: batches.map((batch) => batch.report),
    usedFallback,
    dropped,
    queued: queue.length,
    delivered,
    failed,
    cancelled,
  };

  logger.info({ delivered, failed, queued: queue.length, cancelled }, "group cycle complete");
  return report;
}
