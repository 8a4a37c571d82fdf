/**
 * HTTP Transport
 *
 * The one piece of the client that talks to the network. A transport is
 * created once and shared by every client and every search; it holds no
 * per-search state.
 */

import { createLogger } from "../core/logger";
import { SearchError } from "../core/types";

const log = createLogger("Transport");

/**
 * Raw result of an HTTP call
 */
export interface TransportResponse {
  /** Response body as text */
  body: string;
  /** Response status code */
  status: number;
  /** Time taken in milliseconds */
  tookMs: number;
}

/**
 * Sends a form-encoded POST and hands back the raw body.
 *
 * Implementations throw SearchError with reason "network_error", "api_error"
 * or "rate_limit" for failures; callers treat those as retryable.
 */
export interface HttpTransport {
  postForm(
    url: string,
    form: URLSearchParams,
    headers: Record<string, string>,
  ): Promise<TransportResponse>;
}

/**
 * Options for the fetch-based transport
 */
export interface FetchTransportOptions {
  /** Per-request timeout in milliseconds; no timeout when absent */
  timeoutMs?: number;
}

/**
 * Transport backed by the global `fetch`, which pools and keeps connections
 * alive on its own
 */
export class FetchTransport implements HttpTransport {
  constructor(private readonly options: FetchTransportOptions = {}) {}

  async postForm(
    url: string,
    form: URLSearchParams,
    headers: Record<string, string>,
  ): Promise<TransportResponse> {
    return await fetchWithErrorHandling(url, {
      method: "POST",
      headers,
      body: form,
      timeoutMs: this.options.timeoutMs,
    });
  }
}

/**
 * Options for HTTP requests
 */
export interface FetchOptions {
  method: "GET" | "POST";
  headers: Record<string, string>;
  /** URLSearchParams bodies are sent as application/x-www-form-urlencoded */
  body?: string | URLSearchParams;
  timeoutMs?: number;
}

/**
 * Perform an HTTP fetch with error handling and timeout support
 *
 * @returns The response body as text
 * @throws SearchError on network errors, timeouts and non-2xx statuses
 */
export async function fetchWithErrorHandling(
  url: string,
  options: FetchOptions,
): Promise<TransportResponse> {
  const started = Date.now();
  let response: Response;

  const controller = new AbortController();
  const timeoutId = options.timeoutMs
    ? setTimeout(() => controller.abort(), options.timeoutMs)
    : undefined;

  try {
    response = await fetch(url, {
      method: options.method,
      headers: options.headers,
      body: options.body,
      signal: controller.signal,
    });
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      throw new SearchError("network_error", `Request timeout after ${options.timeoutMs}ms`);
    }

    throw new SearchError(
      "network_error",
      `Network error: ${error instanceof Error ? error.message : String(error)}`,
    );
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }

  if (!response.ok) {
    const errorBody = await response.text().catch((error: unknown) => {
      log.debug("Could not read error body:", error);
      return "";
    });

    // HTTP 429 is reported separately so callers can tell throttling apart
    const reason = response.status === 429 ? "rate_limit" : "api_error";
    throw new SearchError(
      reason,
      `SearXNG API error: HTTP ${response.status} ${response.statusText}${errorBody ? ` - ${errorBody}` : ""}`,
      response.status,
    );
  }

  let body: string;
  try {
    body = await response.text();
  } catch (error) {
    throw new SearchError(
      "network_error",
      `Failed to read response body: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return {
    body,
    status: response.status,
    tookMs: Date.now() - started,
  };
}

/**
 * Build the search endpoint from a base URL, tolerating trailing slashes
 *
 * @example
 * buildSearchUrl("https://search.example.org/") // "https://search.example.org/search"
 */
export function buildSearchUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/search`;
}
