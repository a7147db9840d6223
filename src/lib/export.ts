import { parseArgs } from "node:util";
import { normalizeChartFilters } from "./chart-filters";
import type { ChartFilters, MovieRecord } from "./types";

export const DEFAULT_EXPORT_FILE = "imdb_top250.json";

export type ExportArgs = {
  filters: ChartFilters;
  out: string;
};

export function parseExportArgs(argv: string[]): ExportArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      limit: { type: "string" },
      sort: { type: "string" },
      direction: { type: "string" },
      out: { type: "string", short: "o" },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    filters: normalizeChartFilters({
      limit: values.limit,
      sort: values.sort,
      direction: values.direction,
    }),
    out: values.out?.trim() || DEFAULT_EXPORT_FILE,
  };
}

export function serializeMovies(movies: readonly MovieRecord[]): string {
  return `${JSON.stringify(movies, null, 2)}\n`;
}
