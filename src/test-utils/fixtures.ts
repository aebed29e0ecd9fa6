import { appConfigSchema } from "../config/schema";
import type { AppConfig } from "../config";
import type { Article } from "../pipeline/types";
import { fingerprintArticle } from "../pipeline/fingerprint";

/**
 * Builds an article with sensible defaults. The id is derived from the final
 * title and link unless one is given explicitly.
 */
export function createTestArticle(overrides?: Partial<Article>): Article {
  const title = overrides?.title ?? "Bitcoin rallies as markets open";
  const link = overrides?.link ?? "https://news.example.com/crypto/bitcoin-rallies";
  return {
    id: fingerprintArticle(title, link),
    title,
    link,
    summary: "Crypto prices climbed in early trading.",
    publishedAt: new Date("2026-02-12T10:00:00Z"),
    section: "CRYPTOCURRENCY",
    imageUrl: null,
    sourceName: "Test Source",
    ...overrides,
  };
}

/**
 * Returns a fully defaulted configuration with one group of one RSS source.
 * Overrides are merged at the top level before validation.
 */
export function createTestConfig(overrides?: Record<string, unknown>): AppConfig {
  return appConfigSchema.parse({
    groups: [
      {
        name: "crypto",
        schedule: "*/5 * * * *",
        sources: [
          {
            name: "Test Source",
            kind: "rss",
            endpoints: ["https://news.example.com/rss"],
          },
        ],
      },
    ],
    delivery: {
      destinationId: "@test-channel",
      minIntervalMs: 0,
    },
    store: {
      path: "./data/test-store.json",
      maxRecords: 100,
    },
    ...overrides,
  });
}
