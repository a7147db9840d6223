import { assertOk, fetchPage } from "./http";
import { log } from "./logger";
import { defaults } from "./config";
import type { ChartPage, RawPage } from "./types";

export const PRIMARY_ACCEPT_LANGUAGE = "es-ES,es;q=0.9,en;q=0.8";
export const FALLBACK_ACCEPT_LANGUAGE = "en-US,en;q=0.9";

// Full chart pages run to several hundred KB; anything this short is a placeholder
const MIN_COMPLETE_HTML_LENGTH = 10_000;

export type ChartFetchOptions = {
  timeoutMs?: number;
  userAgent?: string;
  signal?: AbortSignal;
};

export function chartHeaders(
  acceptLanguage: string,
  userAgent: string = defaults.userAgent,
): Record<string, string> {
  return {
    "user-agent": userAgent,
    accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    "accept-language": acceptLanguage,
    "cache-control": "no-cache",
    pragma: "no-cache",
  };
}

const SURROGATE_PAIR_RE = /[\uD800-\uDBFF][\uDC00-\uDFFF]/g;

/** Length in Unicode code points, so an emoji counts once. */
export function textLength(text: string): number {
  return text.length - (text.match(SURROGATE_PAIR_RE)?.length ?? 0);
}

/** IMDb answers some locale/bot checks with a 202 interstitial or a stub page */
export function isPossiblyIncomplete(page: RawPage): boolean {
  return (
    page.status === 202 ||
    !page.html ||
    textLength(page.html) < MIN_COMPLETE_HTML_LENGTH
  );
}

export async function fetchChartPage(
  url: string,
  options: ChartFetchOptions = {},
): Promise<ChartPage> {
  const { timeoutMs = defaults.timeoutMs, userAgent, signal } = options;

  let page = await fetchPage(
    url,
    { headers: chartHeaders(PRIMARY_ACCEPT_LANGUAGE, userAgent), signal },
    timeoutMs,
  );
  let attempts = 1;

  if (isPossiblyIncomplete(page)) {
    log.warn("chart_retry", {
      url,
      status: page.status,
      htmlLength: page.html.length,
      acceptLanguage: FALLBACK_ACCEPT_LANGUAGE,
    });
    page = await fetchPage(
      url,
      { headers: chartHeaders(FALLBACK_ACCEPT_LANGUAGE, userAgent), signal },
      timeoutMs,
    );
    attempts = 2;
  }

  assertOk(url, page);

  log.info("chart_fetched", {
    url,
    status: page.status,
    htmlLength: page.html.length,
    attempts,
  });
  return { ...page, attempts };
}
