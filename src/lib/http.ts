import { errorMessage } from "./logger";
import type { RawPage } from "./types";

const DEFAULT_TIMEOUT_MS = 30_000;

export class FetchError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(
    message: string,
    url: string,
    status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "FetchError";
    this.url = url;
    this.status = status;
  }
}

export function isAbortError(err: unknown): err is Error {
  return err instanceof Error && err.name === "AbortError";
}

/**
 * GET a page and read its body inside one timeout window. A timeout or
 * network failure becomes a FetchError; an abort requested by the caller's
 * own signal is rethrown unchanged.
 */
export async function fetchPage(
  url: string,
  init: RequestInit = {},
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
): Promise<RawPage> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  const signal = init.signal
    ? AbortSignal.any([init.signal, controller.signal])
    : controller.signal;
  try {
    const res = await fetch(url, { ...init, method: "GET", signal });
    const html = await res.text();
    return {
      status: res.status,
      statusText: res.statusText,
      ok: res.ok,
      html,
    };
  } catch (err) {
    if (isAbortError(err)) {
      if (init.signal?.aborted) {
        throw err;
      }
      throw new FetchError(`Request timed out after ${timeoutMs}ms`, url, null, {
        cause: err,
      });
    }
    throw new FetchError(`Request failed: ${errorMessage(err)}`, url, null, {
      cause: err,
    });
  } finally {
    clearTimeout(timeout);
  }
}

export function assertOk(url: string, page: RawPage): void {
  if (!page.ok) {
    throw new FetchError(
      `Request failed: ${page.status} ${page.statusText}`.trim(),
      url,
      page.status,
    );
  }
}
