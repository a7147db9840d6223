import { NextResponse } from "next/server";
import { fetchChart } from "@/lib/chart";
import { filtersFromSearchParams } from "@/lib/chart-filters";
import { chartErrorResponse } from "@/lib/api-errors";

export async function GET(request: Request): Promise<Response> {
  const { searchParams } = new URL(request.url);
  const filters = filtersFromSearchParams(searchParams);

  try {
    const result = await fetchChart(filters, {
      env: process.env,
      signal: request.signal,
    });
    return NextResponse.json(result, {
      headers: { "Cache-Control": "no-store" },
    });
  } catch (err) {
    return chartErrorResponse(err, "movies_request_failed", { ...filters });
  }
}
