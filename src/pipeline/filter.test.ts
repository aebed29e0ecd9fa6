import { describe, it, expect } from "vitest";
import {
  DEFAULT_TAXONOMY,
  filterArticles,
  isFresh,
  keep,
  policyForSource,
  scoreRelevance,
} from "./filter";
import type { FilterPolicy } from "./filter";
import { createTestArticle, createTestConfig } from "../test-utils/fixtures";

const now = new Date("2026-02-12T12:00:00Z");

const basePolicy: FilterPolicy = {
  enforceFreshness: true,
  toleranceMinutes: 180,
  futureSkewMinutes: 30,
  categoryToleranceMinutes: {},
  taxonomy: {
    crypto: { weight: 2, keywords: ["bitcoin", "ethereum"] },
    macro: { weight: 1, keywords: ["inflation", "fed"] },
  },
  minScore: 1,
};

describe("scoreRelevance", () => {
  it("should add the weight of every matching keyword", () => {
    const article = createTestArticle({
      title: "Bitcoin and Ethereum react to inflation data",
      summary: null,
    });

    expect(scoreRelevance(article, basePolicy.taxonomy)).toBe(5);
  });

  it("should match keywords in the summary regardless of case", () => {
    const article = createTestArticle({
      title: "Markets wrap",
      summary: "The FED left rates unchanged.",
    });

    expect(scoreRelevance(article, basePolicy.taxonomy)).toBe(1);
  });

  it("should score zero when nothing matches", () => {
    const article = createTestArticle({
      title: "Local team wins final",
      summary: "A great match.",
    });

    expect(scoreRelevance(article, basePolicy.taxonomy)).toBe(0);
  });
});

describe("isFresh", () => {
  it("should keep articles inside the window and drop those outside", () => {
    const inside = createTestArticle({ publishedAt: new Date("2026-02-12T09:30:00Z") });
    const tooOld = createTestArticle({ publishedAt: new Date("2026-02-12T08:59:00Z") });
    const edge = createTestArticle({ publishedAt: new Date("2026-02-12T09:00:00Z") });
    const skewed = createTestArticle({ publishedAt: new Date("2026-02-12T12:30:00Z") });
    const future = createTestArticle({ publishedAt: new Date("2026-02-12T12:31:00Z") });

    expect(isFresh(inside, basePolicy, now)).toBe(true);
    expect(isFresh(tooOld, basePolicy, now)).toBe(false);
    expect(isFresh(edge, basePolicy, now)).toBe(true);
    expect(isFresh(skewed, basePolicy, now)).toBe(true);
    expect(isFresh(future, basePolicy, now)).toBe(false);
  });

  it("should treat a missing or invalid publish time as fresh", () => {
    const missing = createTestArticle({ publishedAt: null });
    const invalid = createTestArticle({ publishedAt: new Date("garbage") });

    expect(isFresh(missing, basePolicy, now)).toBe(true);
    expect(isFresh(invalid, basePolicy, now)).toBe(true);
  });

  it("should skip the check when freshness is not enforced", () => {
    const ancient = createTestArticle({ publishedAt: new Date("2020-01-01T00:00:00Z") });

    expect(isFresh(ancient, { ...basePolicy, enforceFreshness: false }, now)).toBe(true);
  });

  it("should use the tolerance configured for the article's section", () => {
    const policy: FilterPolicy = {
      ...basePolicy,
      categoryToleranceMinutes: { CRYPTOCURRENCY: 240 },
    };
    const crypto = createTestArticle({
      section: "CRYPTOCURRENCY",
      publishedAt: new Date("2026-02-12T08:30:00Z"),
    });
    const forex = createTestArticle({
      section: "FOREX",
      publishedAt: new Date("2026-02-12T08:30:00Z"),
    });

    expect(isFresh(crypto, policy, now)).toBe(true);
    expect(isFresh(forex, policy, now)).toBe(false);
  });
});

describe("keep", () => {
  it("should return true for unparsable dates under any freshness policy", () => {
    const article = createTestArticle({ publishedAt: new Date("not a date") });

    expect(keep(article, basePolicy, now)).toBe(true);
    expect(keep(article, { ...basePolicy, toleranceMinutes: 1, futureSkewMinutes: 0 }, now)).toBe(true);
    expect(keep(article, { ...basePolicy, enforceFreshness: false }, now)).toBe(true);
  });

  it("should drop relevant but stale articles", () => {
    const article = createTestArticle({ publishedAt: new Date("2026-02-11T12:00:00Z") });

    expect(keep(article, basePolicy, now)).toBe(false);
  });
});

describe("filterArticles", () => {
  it("should keep order and count drop reasons", () => {
    const fresh = createTestArticle({ title: "Bitcoin jumps", publishedAt: now });
    const stale = createTestArticle({
      title: "Ethereum slips",
      publishedAt: new Date("2026-02-10T00:00:00Z"),
    });
    const offTopic = createTestArticle({ title: "Weather update", summary: null });
    const alsoFresh = createTestArticle({ title: "Fed speaker comments", publishedAt: null });

    const result = filterArticles([fresh, stale, offTopic, alsoFresh], basePolicy, now);

    expect(result.kept.map((a) => a.title)).toEqual(["Bitcoin jumps", "Fed speaker comments"]);
    expect(result.dropped).toEqual({ irrelevant: 1, stale: 1, duplicate: 0 });
  });
});

describe("policyForSource", () => {
  it("should fall back to the bundled taxonomy", () => {
    const config = createTestConfig();
    const source = config.groups[0]?.sources[0];
    if (!source) throw new Error("fixture has no source");

    const policy = policyForSource(source, config.relevance);

    expect(policy.taxonomy).toBe(DEFAULT_TAXONOMY);
    expect(policy.minScore).toBe(1);
    expect(policy.enforceFreshness).toBe(false);
    expect(DEFAULT_TAXONOMY["crypto"]?.weight).toBe(2);
  });
});
