/**
 * Export script: fetches the IMDb Top 250 chart and writes the movies as JSON.
 *
 * Usage:
 *   npx tsx scripts/export-chart.ts --limit 100 --sort USER_RATING --direction asc --out top.json
 *
 * Optional env vars: CHART_FETCH_TIMEOUT_MS, CHART_USER_AGENT, LOG_LEVEL
 */

import { writeFile } from "node:fs/promises";
import { fetchChart } from "@/lib/chart";
import { parseExportArgs, serializeMovies } from "@/lib/export";
import { errorMessage, log } from "@/lib/logger";

async function main(): Promise<void> {
  const { filters, out } = parseExportArgs(process.argv.slice(2));
  log.info("export_start", { ...filters, out });

  const result = await fetchChart(filters, { env: process.env });
  await writeFile(out, serializeMovies(result.movies), "utf8");

  log.info("export_done", {
    out,
    count: result.count,
    url: result.url,
    ldjsonBlocks: result.diagnostics.ldjson_blocks,
  });
}

main().catch((err: unknown) => {
  log.error("export_failed", { error: errorMessage(err) });
  process.exit(1);
});
