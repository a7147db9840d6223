import { NextResponse } from "next/server";
import { sortOptions } from "@/lib/chart-filters";

export function GET(): Response {
  return NextResponse.json(
    { options: sortOptions() },
    { headers: { "Cache-Control": "public, max-age=86400" } },
  );
}
