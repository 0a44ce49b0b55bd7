/**
 * carbon-data types
 *
 * Every client call resolves to a CarbonDataResult. Clients never throw:
 * network failures, timeouts and malformed payloads come back as
 * `ok: false` with an error code.
 */

export type FetchLike = (url: string, init?: { headers?: Record<string, string>; signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}>;

export interface CarbonDataClientConfig {
  baseUrl: string;
  /** Sent as the `auth-token` header when present */
  token?: string;
  timeoutMs?: number;
  /** Injected in tests; defaults to the global fetch */
  fetchImpl?: FetchLike;
}

export type CarbonDataErrorCode =
  | "NOT_CONFIGURED"
  | "UNKNOWN_CATEGORY"
  | "HTTP_ERROR"
  | "TIMEOUT"
  | "FETCH_ERROR"
  | "BAD_PAYLOAD";

export interface CarbonDataValue {
  ok: true;
  value: number;
  unit: string;
  source_url: string;
  fetched_at_utc: string;
}

export interface CarbonDataError {
  ok: false;
  error_code: CarbonDataErrorCode;
  error_text: string;
  fetched_at_utc: string;
}

export type CarbonDataResult = CarbonDataValue | CarbonDataError;

export interface ResolvedValue {
  value: number;
  source: "api" | "fallback";
}
