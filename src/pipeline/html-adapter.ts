// pattern: Functional Core
import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import type { Article, AdapterContext, ParseResult } from "./types";
import { fingerprintArticle } from "./fingerprint";
import { detectSection } from "./section";
import { normalizeWhitespace, resolveUrl, truncate } from "./text";

const SUMMARY_LIMIT = 200;
const MIN_TITLE_LENGTH = 10;
const PUBLISHER_PREFIX = /^Investing\.com[-\s]*/i;

export type ResolvedSelectors = {
  readonly blocks: ReadonlyArray<string>;
  readonly title: ReadonlyArray<string>;
  readonly summary: string;
  readonly image: ReadonlyArray<string>;
};

/**
 * Generic listing-page selectors, most specific first. Sources override the
 * block list when a site's markup needs it.
 */
export const DEFAULT_HTML_SELECTORS: ResolvedSelectors = {
  blocks: [
    'article[data-test="article-item"]',
    'div[data-test="article-item"]',
    "article.js-article-item",
    "div.articleItem",
    "article",
    'div[class*="article"]',
    'div[class*="story"]',
    'div[class*="news"]',
  ],
  title: ["h3", "h2", "h4", "a", ".title"],
  summary: "p, .summary, .description",
  image: ["img[data-src]", "img[src]"],
};

/**
 * Returns the matches of the first selector yielding more than `minMatches`
 * elements, or null. Selectors the engine cannot parse are passed over.
 */
export function selectBlocks(
  $: CheerioAPI,
  selectors: ReadonlyArray<string>,
  minMatches: number,
): { readonly selector: string; readonly blocks: Cheerio<Element> } | null {
  for (const selector of selectors) {
    try {
      const blocks = $<Element, string>(selector);
      if (blocks.length > minMatches) return { selector, blocks };
    } catch {
      continue;
    }
  }
  return null;
}

function findTitle(
  block: Cheerio<Element>,
  selectors: ReadonlyArray<string>,
): string | null {
  for (const selector of selectors) {
    const text = normalizeWhitespace(block.find(selector).first().text());
    if (text.length > MIN_TITLE_LENGTH) return text;
  }
  if (block.is("a")) {
    const own = normalizeWhitespace(block.text());
    if (own.length > MIN_TITLE_LENGTH) return own;
  }
  return null;
}

function findLink(block: Cheerio<Element>, pageUrl: string): string | null {
  const href = block.is("a[href]")
    ? block.attr("href")
    : block.find("a[href]").first().attr("href");
  return href ? resolveUrl(href.trim(), pageUrl) : null;
}

function findImage(
  block: Cheerio<Element>,
  selectors: ReadonlyArray<string>,
  pageUrl: string,
): string | null {
  for (const selector of selectors) {
    const img = block.find(selector).first();
    const src = img.attr("data-src") ?? img.attr("src");
    if (src) {
      const resolved = resolveUrl(src.trim(), pageUrl);
      if (resolved) return resolved;
    }
  }
  return null;
}

function findPublishedAt(block: Cheerio<Element>): Date | null {
  const raw = block.find("time[datetime]").first().attr("datetime");
  if (!raw) return null;
  const date = new Date(raw);
  return isNaN(date.getTime()) ? null : date;
}

/**
 * Extracts article blocks from a listing page. Missing summaries or images
 * degrade to null; blocks without a usable title or link are skipped.
 * A leading "Investing.com -" publisher credit is cut from summaries.
 * Repeated links (nested matches of the same card) are reported once.
 */
export function parseHtmlDocument(
  html: string,
  context: AdapterContext,
  selectors: ResolvedSelectors,
  minMatches: number,
): ParseResult {
  const $ = cheerio.load(html);
  const match = selectBlocks($, selectors.blocks, minMatches);
  if (!match) {
    return { articles: [], skipped: 0, error: null };
  }

  const articles: Array<Article> = [];
  const seen = new Set<string>();
  let skipped = 0;

  match.blocks.each((_, element) => {
    try {
      const block = $(element);
      const title = findTitle(block, selectors.title);
      const link = findLink(block, context.pageUrl);
      if (!title || !link) {
        skipped++;
        return;
      }

      const id = fingerprintArticle(title, link);
      if (seen.has(id)) return;
      seen.add(id);

      const summaryText = normalizeWhitespace(
        block.find(selectors.summary).first().text(),
      ).replace(PUBLISHER_PREFIX, "");
      const summary = summaryText ? truncate(summaryText, SUMMARY_LIMIT) : null;

      articles.push({
        id,
        title,
        link,
        summary,
        publishedAt: findPublishedAt(block),
        section: context.section ?? detectSection(link, title, summary),
        imageUrl: findImage(block, selectors.image, context.pageUrl),
        sourceName: context.sourceName,
      });
    } catch {
      skipped++;
    }
  });

  return { articles, skipped, error: null };
}
