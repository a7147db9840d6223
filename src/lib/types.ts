export type SortKey =
  | "RANKING"
  | "USER_RATING"
  | "RELEASE_DATE"
  | "USER_RATING_COUNT"
  | "TITLE_REGIONAL"
  | "POPULARITY"
  | "RUNTIME";

export type SortDirection = "asc" | "desc";

export type ChartFilters = {
  readonly limit: number; // 1-250
  readonly sort: SortKey;
  readonly direction: SortDirection;
};

export type RawPage = {
  status: number;
  statusText: string;
  ok: boolean;
  html: string;
};

export type ChartPage = RawPage & {
  attempts: number;
};

/** tconst (e.g. "tt0111161") -> chart position */
export type RankIndex = ReadonlyMap<string, number>;

export type JsonObject = Record<string, unknown>;

export type ItemListNode = JsonObject & {
  "@type": "ItemList";
  itemListElement: unknown;
};

/** Any value `JSON.parse` can produce. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// Source fields are copied as served: IMDb may send a string rating or an
// ImageObject, and both reach the output unchanged.
export type MovieRecord = {
  rank: number;
  url?: JsonValue;
  name?: JsonValue;
  alternateName?: JsonValue;
  description?: JsonValue;
  image?: JsonValue;
  ratingValue?: JsonValue;
  ratingCount?: JsonValue;
  contentRating?: JsonValue;
  genre?: JsonValue;
  duration?: JsonValue; // ISO 8601, e.g. "PT2H22M"
};

export type ParsedChart = {
  movies: MovieRecord[];
  ldJsonBlocks: number;
  ldJsonParseErrors: number;
  skippedElements: number;
  positionalRanks: number;
};

export type ChartDiagnostics = {
  http_status: number;
  html_length: number;
  ldjson_blocks: number;
  attempts: number;
  ldjson_parse_errors: number;
  skipped_elements: number;
  positional_ranks: number;
};

export type FetchResult = {
  url: string;
  filters: ChartFilters;
  diagnostics: ChartDiagnostics;
  count: number;
  movies: MovieRecord[];
};
