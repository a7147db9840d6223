import { NextResponse } from "next/server";
import { fetchChart } from "@/lib/chart";
import { filtersFromSearchParams } from "@/lib/chart-filters";
import { chartErrorResponse } from "@/lib/api-errors";
import { DEFAULT_EXPORT_FILE } from "@/lib/export";

export async function GET(request: Request): Promise<Response> {
  const { searchParams } = new URL(request.url);
  const filters = filtersFromSearchParams(searchParams);

  try {
    const { movies } = await fetchChart(filters, {
      env: process.env,
      signal: request.signal,
    });
    return new NextResponse(JSON.stringify(movies), {
      headers: {
        "Content-Type": "application/json; charset=utf-8",
        "Content-Disposition": `attachment; filename=${DEFAULT_EXPORT_FILE}`,
        "Cache-Control": "no-store",
      },
    });
  } catch (err) {
    return chartErrorResponse(err, "movies_download_failed", { ...filters });
  }
}
