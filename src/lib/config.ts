const DEFAULT_TIMEOUT_MS = 30_000;
// Largest delay setTimeout honours; anything above fires after 1ms.
const MAX_TIMER_MS = 2_147_483_647;
const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36";

export type ChartConfig = { timeoutMs: number; userAgent: string };

function parseTimeout(value: string | undefined, fallback: number): number {
  if (value == null || !/^\d+$/.test(value.trim())) return fallback;
  const n = Number.parseInt(value, 10);
  return n > 0 && n <= MAX_TIMER_MS ? n : fallback;
}

export function getChartConfig(
  env: Record<string, string | undefined>,
): ChartConfig {
  return {
    timeoutMs: parseTimeout(env.CHART_FETCH_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    userAgent: env.CHART_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
  };
}

export const defaults = {
  timeoutMs: DEFAULT_TIMEOUT_MS,
  userAgent: DEFAULT_USER_AGENT,
};
