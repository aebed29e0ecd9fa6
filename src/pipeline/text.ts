// pattern: Functional Core
import * as cheerio from "cheerio";

/**
 * Removes markup from an HTML fragment and collapses runs of whitespace.
 */
export function stripHtml(html: string): string {
  const $ = cheerio.load(html, null, false);
  return normalizeWhitespace($.root().text());
}

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Caps `text` at `maxLength` characters, marking the cut with an ellipsis.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength).trimEnd()}...`;
}

/**
 * First `<img src>` inside an HTML fragment, or null.
 */
export function firstImageSrc(html: string): string | null {
  const $ = cheerio.load(html, null, false);
  const src = $("img[src]").first().attr("src")?.trim();
  return src ? src : null;
}

/**
 * Resolves `href` against `base`, returning null for values that are not
 * http(s) URLs once resolved.
 */
export function resolveUrl(href: string, base: string): string | null {
  try {
    const url = new URL(href, base);
    if (url.protocol !== "http:" && url.protocol !== "https:") return null;
    return url.href;
  } catch {
    return null;
  }
}
