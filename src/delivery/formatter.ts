// pattern: Functional Core
import type { Article } from "../pipeline/types";
import type { DeliveryMessage } from "./worker";
import assetFlags from "./asset-flags.json";

export type MessageOptions = {
  readonly includeSummary: boolean;
  readonly includeImages: boolean;
  readonly includeFlags: boolean;
  readonly footer?: string;
  /** Escape the text for Telegram's HTML parse mode and bold the headline. */
  readonly html?: boolean;
};

type FlagTable = Readonly<Record<string, string>>;

/** Keyword to flag tables. Crypto keywords win over countries and commodities. */
const FLAG_TABLES: ReadonlyArray<FlagTable> = [assetFlags.crypto, assetFlags.general];

const SECTION_EMOJIS: ReadonlyArray<readonly [string, string]> = [
  ["CRYPTO", "₿"],
  ["FOREX", "💱"],
  ["STOCK", "📈"],
  ["ECONOMIC", "🏛️"],
  ["COMMODITIES", "🛢️"],
  ["BREAKING", "🚨"],
];

const DEFAULT_EMOJI = "📰";

export function sectionEmoji(section: string): string {
  const upper = section.toUpperCase();
  const match = SECTION_EMOJIS.find(([key]) => upper.includes(key));
  return match ? match[1] : DEFAULT_EMOJI;
}

function mentions(content: string, keyword: string): boolean {
  const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`(?<![\\p{L}\\p{N}])${escaped}(?![\\p{L}\\p{N}])`, "u").test(content);
}

/**
 * Flag for the first keyword, in table order, that appears as a whole word
 * in the title or summary. Null when nothing matches.
 */
export function detectFlag(title: string, summary: string | null): string | null {
  const content = `${title} ${summary ?? ""}`.toLowerCase();
  for (const table of FLAG_TABLES) {
    for (const [keyword, flag] of Object.entries(table)) {
      if (mentions(content, keyword)) return flag;
    }
  }
  return null;
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/**
 * Renders one article. `headline` replaces the title so a translated title
 * can be passed in; the flag is still detected from the source text. A flag
 * identical to the section emoji is not repeated.
 */
export function formatMessage(
  article: Article,
  headline: string,
  options: MessageOptions,
): DeliveryMessage {
  const escape = options.html ? escapeHtml : (text: string) => text;

  const emoji = sectionEmoji(article.section);
  const flag = options.includeFlags ? detectFlag(article.title, article.summary) : null;
  const title = options.html ? `<b>${escape(headline)}</b>` : headline;
  const heading = [emoji, flag !== emoji ? flag : null, title]
    .filter((part): part is string => part !== null)
    .join(" ");

  const blocks = [heading];

  const summary = article.summary?.trim();
  if (options.includeSummary && summary) {
    blocks.push(escape(summary));
  }

  const footer = options.footer?.trim();
  if (footer) {
    blocks.push(escape(footer));
  }

  return {
    text: blocks.join("\n\n"),
    imageUrl: options.includeImages ? article.imageUrl : null,
  };
}
