import { buildChartUrl } from "./chart-filters";
import { getChartConfig } from "./config";
import { fetchChartPage, textLength } from "./imdb-chart";
import { log } from "./logger";
import { toMovieRecords } from "./normalize";
import { findItemList, parseRankIndex, regexMarkupMatcher } from "./parsers";
import type { ChartMarkupMatcher } from "./parsers";
import type {
  ChartFilters,
  ChartPage,
  FetchResult,
  ParsedChart,
} from "./types";

export type FetchChartOptions = {
  env?: Record<string, string | undefined>;
  signal?: AbortSignal;
};

export function parseChartHtml(
  html: string,
  matcher: ChartMarkupMatcher = regexMarkupMatcher,
): ParsedChart {
  const ranks = parseRankIndex(html, matcher);
  const { itemList, blocks, parseErrors } = findItemList(html, matcher);
  const { movies, skippedElements, positionalRanks } = toMovieRecords(
    itemList,
    ranks,
    matcher,
  );

  return {
    movies,
    ldJsonBlocks: blocks,
    ldJsonParseErrors: parseErrors,
    skippedElements,
    positionalRanks,
  };
}

export function assembleResult(
  url: string,
  filters: ChartFilters,
  page: ChartPage,
  parsed: ParsedChart,
): FetchResult {
  const movies = parsed.movies.slice(0, filters.limit);
  return {
    url,
    filters: {
      limit: filters.limit,
      sort: filters.sort,
      direction: filters.direction,
    },
    diagnostics: {
      http_status: page.status,
      html_length: textLength(page.html),
      ldjson_blocks: parsed.ldJsonBlocks,
      attempts: page.attempts,
      ldjson_parse_errors: parsed.ldJsonParseErrors,
      skipped_elements: parsed.skippedElements,
      positional_ranks: parsed.positionalRanks,
    },
    count: movies.length,
    movies,
  };
}

/** Fetch → parse → merge → truncate. Throws FetchError only. */
export async function fetchChart(
  filters: ChartFilters,
  options: FetchChartOptions = {},
): Promise<FetchResult> {
  const { timeoutMs, userAgent } = getChartConfig(options.env ?? process.env);
  const url = buildChartUrl(filters);

  const page = await fetchChartPage(url, {
    timeoutMs,
    userAgent,
    signal: options.signal,
  });
  const parsed = parseChartHtml(page.html);

  if (parsed.movies.length === 0) {
    log.warn("chart_empty", {
      url,
      ldjsonBlocks: parsed.ldJsonBlocks,
      ldjsonParseErrors: parsed.ldJsonParseErrors,
    });
  } else {
    log.info("chart_parsed", {
      url,
      movies: parsed.movies.length,
      skippedElements: parsed.skippedElements,
      positionalRanks: parsed.positionalRanks,
    });
  }

  return assembleResult(url, filters, page, parsed);
}
