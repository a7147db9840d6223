import type { ChartFilters, SortDirection, SortKey } from "./types";

export const DEFAULT_CHART_URL =
  "https://www.imdb.com/es-es/chart/top/?ref_=hm_nv_menu";

export const DEFAULT_LIMIT = 50;
export const MIN_LIMIT = 1;
export const MAX_LIMIT = 250;

const SORT_LABELS: Readonly<Record<SortKey, string>> = Object.freeze({
  RANKING: "Ranking (default)",
  USER_RATING: "IMDb rating",
  RELEASE_DATE: "Release date",
  USER_RATING_COUNT: "Rating count",
  TITLE_REGIONAL: "Title (regional)",
  POPULARITY: "Popularity",
  RUNTIME: "Runtime",
});

// RANKING is the chart's own order and has no query parameter
const SORT_PARAM_VALUES: Readonly<Partial<Record<SortKey, string>>> =
  Object.freeze({
    USER_RATING: "user_rating",
    RELEASE_DATE: "release_date",
    USER_RATING_COUNT: "user_rating_count",
    TITLE_REGIONAL: "title_regional",
    POPULARITY: "popularity",
    RUNTIME: "runtime",
  });

export type SortOption = { value: SortKey; label: string };

export type RawChartFilters = {
  limit?: string | null;
  sort?: string | null;
  direction?: string | null;
};

function isSortKey(value: string): value is SortKey {
  return Object.hasOwn(SORT_LABELS, value);
}

export function sortOptions(): SortOption[] {
  const options: SortOption[] = [];
  for (const value of Object.keys(SORT_LABELS)) {
    if (isSortKey(value)) options.push({ value, label: SORT_LABELS[value] });
  }
  return options;
}

export function normalizeLimit(value: string | null | undefined): number {
  const trimmed = value?.trim();
  if (!trimmed || !/^[+-]?\d+$/.test(trimmed)) return DEFAULT_LIMIT;
  const n = Number.parseInt(trimmed, 10);
  return Math.max(MIN_LIMIT, Math.min(MAX_LIMIT, n));
}

export function normalizeSort(value: string | null | undefined): SortKey {
  return value != null && isSortKey(value) ? value : "RANKING";
}

export function normalizeDirection(
  value: string | null | undefined,
): SortDirection {
  return value === "asc" || value === "desc" ? value : "desc";
}

export function normalizeChartFilters(raw: RawChartFilters = {}): ChartFilters {
  return Object.freeze({
    limit: normalizeLimit(raw.limit),
    sort: normalizeSort(raw.sort),
    direction: normalizeDirection(raw.direction),
  });
}

/**
 * IMDb sorts the chart server-side through `&sort=<param>%2C<direction>`.
 * The default ranking ignores direction entirely.
 */
export function buildChartUrl(filters: ChartFilters): string {
  if (filters.sort === "RANKING") return DEFAULT_CHART_URL;

  const sortValue = SORT_PARAM_VALUES[filters.sort];
  if (!sortValue) return DEFAULT_CHART_URL;

  return `${DEFAULT_CHART_URL}&sort=${sortValue}%2C${filters.direction}`;
}

export function filtersFromSearchParams(params: URLSearchParams): ChartFilters {
  return normalizeChartFilters({
    limit: params.get("limit"),
    sort: params.get("sort"),
    direction: params.get("direction"),
  });
}
