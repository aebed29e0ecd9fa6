// pattern: Functional Core
import Parser from "rss-parser";
import type { Article, AdapterContext, ParseResult } from "./types";
import { fingerprintArticle } from "./fingerprint";
import { detectSection } from "./section";
import {
  firstImageSrc,
  normalizeWhitespace,
  resolveUrl,
  stripHtml,
  truncate,
} from "./text";

const SUMMARY_LIMIT = 300;

type MediaElement = {
  readonly $?: {
    readonly url?: string;
    readonly type?: string;
    readonly medium?: string;
  };
};

type CustomItem = {
  readonly mediaContent?: ReadonlyArray<MediaElement>;
  readonly mediaThumbnail?: ReadonlyArray<MediaElement>;
  readonly description?: string;
};

type FeedItem = Parser.Item & CustomItem;

let parserInstance: Parser<Record<string, unknown>, CustomItem> | null = null;

function getParser(): Parser<Record<string, unknown>, CustomItem> {
  if (!parserInstance) {
    parserInstance = new Parser<Record<string, unknown>, CustomItem>({
      customFields: {
        item: [
          ["media:content", "mediaContent", { keepArray: true }],
          ["media:thumbnail", "mediaThumbnail", { keepArray: true }],
          ["description", "description"],
        ],
      },
    });
  }
  return parserInstance;
}

function isImageMedia(element: MediaElement): boolean {
  const attrs = element.$;
  if (!attrs?.url) return false;
  if (attrs.type === undefined && attrs.medium === undefined) return true;
  return attrs.type?.startsWith("image/") === true || attrs.medium === "image";
}

/**
 * Image lookup order: media:content (or media:thumbnail), then an image
 * enclosure, then the first `<img>` inside the entry's HTML.
 */
export function findImage(item: FeedItem, pageUrl: string): string | null {
  const media = [...(item.mediaContent ?? []), ...(item.mediaThumbnail ?? [])]
    .filter(isImageMedia)
    .map((element) => element.$?.url)
    .find((url) => typeof url === "string" && url.length > 0);
  if (media) return resolveUrl(media, pageUrl);

  const enclosure = item.enclosure;
  if (enclosure?.url && enclosure.type?.startsWith("image/")) {
    return resolveUrl(enclosure.url, pageUrl);
  }

  for (const html of [item.content, item.summary, item.description]) {
    if (typeof html !== "string" || html.length === 0) continue;
    const src = firstImageSrc(html);
    if (src) return resolveUrl(src, pageUrl);
  }

  return null;
}

function parseDate(item: FeedItem): Date | null {
  const raw = item.isoDate ?? item.pubDate;
  if (!raw) return null;
  const date = new Date(raw);
  return isNaN(date.getTime()) ? null : date;
}

function toArticle(item: FeedItem, context: AdapterContext): Article | null {
  const title = item.title ? normalizeWhitespace(item.title) : "";
  const link = item.link ? resolveUrl(item.link.trim(), context.pageUrl) : null;
  if (!title || !link) return null;

  const rawSummary = item.content ?? item.summary ?? item.description ?? "";
  const plain = stripHtml(rawSummary);
  const summary = plain ? truncate(plain, SUMMARY_LIMIT) : null;

  return {
    id: fingerprintArticle(title, link),
    title,
    link,
    summary,
    publishedAt: parseDate(item),
    section: context.section ?? detectSection(link, title, summary),
    imageUrl: findImage(item, context.pageUrl),
    sourceName: context.sourceName,
  };
}

/**
 * Parses an RSS or Atom document into articles in document order. Entries
 * without a title or link are skipped; a document that cannot be parsed at
 * all is reported through `error`.
 */
export async function parseRss(
  payload: string,
  context: AdapterContext,
): Promise<ParseResult> {
  let items: ReadonlyArray<FeedItem>;
  try {
    const feed = await getParser().parseString(payload);
    items = feed.items;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { articles: [], skipped: 0, error: `malformed feed: ${message}` };
  }

  const articles: Array<Article> = [];
  let skipped = 0;

  for (const item of items) {
    try {
      const article = toArticle(item, context);
      if (article) {
        articles.push(article);
      } else {
        skipped++;
      }
    } catch {
      skipped++;
    }
  }

  return { articles, skipped, error: null };
}
