/**
 * http.ts — Shared GET with timeout for the carbon-data clients
 *
 * One attempt per call. AbortController cancels the request after
 * `timeoutMs` (default 3000 ms).
 */

import type {
  CarbonDataClientConfig,
  CarbonDataError,
  CarbonDataErrorCode,
  CarbonDataResult,
  FetchLike,
  ResolvedValue,
} from "./types";

export const DEFAULT_TIMEOUT_MS = 3000;

export function errorResult(code: CarbonDataErrorCode, text: string): CarbonDataError {
  return {
    ok: false,
    error_code: code,
    error_text: text,
    fetched_at_utc: new Date().toISOString(),
  };
}

/** Walk a dotted path through an untyped JSON payload. */
export function numberAt(payload: unknown, path: string[]): number | null {
  let node: unknown = payload;
  for (const key of path) {
    if (typeof node !== "object" || node === null || !(key in node)) return null;
    node = Object.getOwnPropertyDescriptor(node, key)?.value;
  }
  return typeof node === "number" && Number.isFinite(node) ? node : null;
}

export async function getJson(
  config: CarbonDataClientConfig,
  url: string,
): Promise<{ ok: true; body: unknown } | CarbonDataError> {
  const fetchImpl: FetchLike = config.fetchImpl ?? fetch;
  const timeout = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const headers: Record<string, string> = { accept: "application/json" };
  if (config.token) headers["auth-token"] = config.token;

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetchImpl(url, { headers, signal: controller.signal });
    if (!response.ok) {
      return errorResult("HTTP_ERROR", `HTTP ${response.status} from ${url}`);
    }
    const body = await response.json();
    return { ok: true, body };
  } catch (err) {
    if (controller.signal.aborted) {
      return errorResult("TIMEOUT", `No response within ${timeout} ms from ${url}`);
    }
    return errorResult("FETCH_ERROR", err instanceof Error ? err.message : String(err));
  } finally {
    clearTimeout(timer);
  }
}

/** Prefer the live value; otherwise the local table value. */
export function resolveWithFallback(result: CarbonDataResult, fallback: number): ResolvedValue {
  if (result.ok) return { value: result.value, source: "api" };
  console.warn(`[carbon-data] ${result.error_code}: ${result.error_text} (using fallback ${fallback})`);
  return { value: fallback, source: "fallback" };
}

export function trimBase(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "");
}
