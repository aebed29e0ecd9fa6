/**
 * Normalized news item. Every adapter produces this shape regardless of the
 * document format it parsed.
 */
export type Article = {
  readonly id: string;
  readonly title: string;
  readonly link: string;
  readonly summary: string | null;
  readonly publishedAt: Date | null;
  readonly section: string;
  readonly imageUrl: string | null;
  readonly sourceName: string;
};

/**
 * Outcome of parsing one payload. `skipped` counts entries dropped for missing
 * fields or per-entry failures; `error` is set only when the whole document
 * could not be read.
 */
export type ParseResult = {
  readonly articles: ReadonlyArray<Article>;
  readonly skipped: number;
  readonly error: string | null;
};

export type FetchErrorClass = "timeout" | "rejected" | "empty";

export type FetchResult =
  | {
      readonly success: true;
      readonly payload: string;
      readonly strategy: string;
      readonly url: string;
    }
  | {
      readonly success: false;
      readonly errorClass: FetchErrorClass;
      readonly error: string;
      readonly url: string;
    };

export type DropReason = "irrelevant" | "stale" | "duplicate";

export type FilterResult = {
  readonly kept: ReadonlyArray<Article>;
  readonly dropped: Readonly<Record<DropReason, number>>;
};

/**
 * Per-source facts an adapter needs beyond the payload itself.
 */
export type AdapterContext = {
  readonly sourceName: string;
  readonly section: string | undefined;
  readonly pageUrl: string;
};

export type ParseFn = (
  payload: string,
  context: AdapterContext,
) => Promise<ParseResult>;
