// pattern: Functional Core
import type { AppConfig, SourceConfig, Taxonomy } from "../config";
import type { Article, DropReason, FilterResult } from "./types";
import defaultTaxonomy from "./default-taxonomy.json";

const MINUTE_MS = 60_000;

export const DEFAULT_TAXONOMY: Taxonomy = defaultTaxonomy;

export type FilterPolicy = {
  readonly enforceFreshness: boolean;
  readonly toleranceMinutes: number;
  readonly futureSkewMinutes: number;
  readonly categoryToleranceMinutes: Readonly<Record<string, number>>;
  readonly taxonomy: Taxonomy;
  readonly minScore: number;
};

export function policyForSource(
  source: SourceConfig,
  relevance: AppConfig["relevance"],
): FilterPolicy {
  return {
    enforceFreshness: source.enforceFreshness,
    toleranceMinutes: source.toleranceMinutes,
    futureSkewMinutes: source.futureSkewMinutes,
    categoryToleranceMinutes: source.categoryToleranceMinutes,
    taxonomy: relevance.taxonomy ?? DEFAULT_TAXONOMY,
    minScore: relevance.minScore,
  };
}

/**
 * Sums the weight of every taxonomy keyword that appears in the title or
 * summary. Matching is case-insensitive substring matching.
 */
export function scoreRelevance(article: Article, taxonomy: Taxonomy): number {
  const content = `${article.title} ${article.summary ?? ""}`.toLowerCase();
  let score = 0;
  for (const group of Object.values(taxonomy)) {
    for (const keyword of group.keywords) {
      if (content.includes(keyword.toLowerCase())) score += group.weight;
    }
  }
  return score;
}

/**
 * Missing or unparsable publish times count as fresh.
 */
export function isFresh(article: Article, policy: FilterPolicy, now: Date): boolean {
  if (!policy.enforceFreshness) return true;

  const published = article.publishedAt?.getTime();
  if (published === undefined || isNaN(published)) return true;

  const tolerance =
    policy.categoryToleranceMinutes[article.section] ?? policy.toleranceMinutes;
  const earliest = now.getTime() - tolerance * MINUTE_MS;
  const latest = now.getTime() + policy.futureSkewMinutes * MINUTE_MS;

  return published >= earliest && published <= latest;
}

export function isRelevant(article: Article, policy: FilterPolicy): boolean {
  return scoreRelevance(article, policy.taxonomy) >= policy.minScore;
}

export function keep(article: Article, policy: FilterPolicy, now: Date): boolean {
  return isRelevant(article, policy) && isFresh(article, policy, now);
}

/**
 * Applies {@link keep} to a batch, preserving order and counting why each
 * dropped article was rejected.
 */
export function filterArticles(
  articles: ReadonlyArray<Article>,
  policy: FilterPolicy,
  now: Date,
): FilterResult {
  const kept: Array<Article> = [];
  const dropped: Record<DropReason, number> = {
    irrelevant: 0,
    stale: 0,
    duplicate: 0,
  };

  for (const article of articles) {
    if (!isRelevant(article, policy)) {
      dropped.irrelevant++;
    } else if (!isFresh(article, policy, now)) {
      dropped.stale++;
    } else {
      kept.push(article);
    }
  }

  return { kept, dropped };
}
