// pattern: Functional Core

export const DEFAULT_SECTION = "BREAKING-NEWS";

const URL_RULES: ReadonlyArray<readonly [string, ReadonlyArray<string>]> = [
  ["STOCK-MARKET", ["stock-market", "equities"]],
  ["CRYPTOCURRENCY", ["crypto", "bitcoin"]],
  ["FOREX", ["forex", "currencies"]],
  ["COMMODITIES", ["commodities", "gold", "oil"]],
  ["ECONOMIC-INDICATORS", ["economic-indicators", "economy"]],
  ["EARNINGS", ["earnings"]],
];

const CONTENT_RULES: ReadonlyArray<readonly [string, ReadonlyArray<string>]> = [
  ["CRYPTOCURRENCY", ["bitcoin", "crypto", "ethereum"]],
  ["ECONOMIC-INDICATORS", ["fed ", "jobs", "unemployment", "inflation", "gdp"]],
  ["STOCK-MARKET", ["stock", "shares", "earnings", "nasdaq", "dow "]],
  ["FOREX", ["dollar", "yen", "euro", "forex", "currency"]],
  ["COMMODITIES", ["gold", "oil", "commodity", "crude"]],
];

/**
 * Guesses a category tag for an article, first from its URL path and then
 * from its text. Falls back to {@link DEFAULT_SECTION}.
 */
export function detectSection(
  link: string,
  title: string,
  summary: string | null,
): string {
  const path = link.toLowerCase();
  for (const [section, needles] of URL_RULES) {
    if (needles.some((needle) => path.includes(needle))) return section;
  }

  const content = `${title} ${summary ?? ""} `.toLowerCase();
  for (const [section, needles] of CONTENT_RULES) {
    if (needles.some((needle) => content.includes(needle))) return section;
  }

  return DEFAULT_SECTION;
}
