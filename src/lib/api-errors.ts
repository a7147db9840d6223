import { NextResponse } from "next/server";
import { FetchError, isAbortError } from "./http";
import { errorMessage, log } from "./logger";

/** Maps a failed chart fetch to the route's error response */
export function chartErrorResponse(
  err: unknown,
  event: string,
  context: Record<string, unknown> = {},
): Response {
  if (isAbortError(err)) {
    return new Response(null, { status: 499 });
  }
  if (err instanceof FetchError) {
    log.warn(event, {
      ...context,
      url: err.url,
      status: err.status,
      error: err.message,
    });
    return NextResponse.json({ error: err.message }, { status: 502 });
  }
  log.error(event, { ...context, error: errorMessage(err) });
  return NextResponse.json({ error: "Chart fetch failed" }, { status: 500 });
}
