import type { SourceConfig } from "../config";
import type { ParseFn } from "./types";
import { parseRss } from "./rss-adapter";
import { DEFAULT_HTML_SELECTORS, parseHtmlDocument } from "./html-adapter";
import type { ResolvedSelectors } from "./html-adapter";

export type SourceAdapter =
  | { readonly kind: "rss"; readonly parse: ParseFn }
  | {
      readonly kind: "html";
      readonly selectors: ResolvedSelectors;
      readonly minMatches: number;
      readonly parse: ParseFn;
    };

/**
 * Picks the adapter for a source's kind. HTML sources get their configured
 * selectors layered over the defaults.
 */
export function createAdapter(source: SourceConfig): SourceAdapter {
  switch (source.kind) {
    case "rss":
      return { kind: "rss", parse: parseRss };
    case "html": {
      const selectors: ResolvedSelectors = {
        blocks: source.selectors?.blocks ?? DEFAULT_HTML_SELECTORS.blocks,
        title: source.selectors?.title ?? DEFAULT_HTML_SELECTORS.title,
        summary: source.selectors?.summary ?? DEFAULT_HTML_SELECTORS.summary,
        image: source.selectors?.image ?? DEFAULT_HTML_SELECTORS.image,
      };
      const minMatches = source.minMatches;
      return {
        kind: "html",
        selectors,
        minMatches,
        parse: async (payload, context) =>
          parseHtmlDocument(payload, context, selectors, minMatches),
      };
    }
    default: {
      const _exhaustive: never = source.kind;
      throw new Error(`unknown source kind: ${_exhaustive}`);
    }
  }
}
