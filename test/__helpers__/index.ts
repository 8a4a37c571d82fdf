/**
 * Consolidated Test Utilities and Helpers
 *
 * Payload factories and an in-memory transport for searxng-pager tests.
 */

import type { SearchParameters } from "../../src/core/request";
import { parseFormData } from "../../src/core/request";
import { SearchError } from "../../src/core/types";
import type { HttpTransport, TransportResponse } from "../../src/providers/utils";

// ============ Payload Factories ============

/**
 * Result element in the legacy shape (required fields only)
 */
export function createLegacyPayload(
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    template: "default.html",
    engine: "duckduckgo",
    title: "Legacy Result",
    content: "Legacy content",
    img_src: "",
    thumbnail: "",
    priority: "",
    score: 1,
    category: "general",
    ...overrides,
  };
}

/**
 * Result element in the main shape (required fields only)
 */
export function createMainPayload(
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    template: "default.html",
    title: "Main Result",
    content: "Main content",
    img_src: "",
    iframe_src: "",
    audio_src: "",
    thumbnail: "",
    views: "",
    author: "",
    metadata: "",
    priority: "",
    open_group: false,
    close_group: false,
    score: 1,
    category: "general",
    ...overrides,
  };
}

/**
 * Numbered legacy results for pagination tests
 */
export function createPageResults(page: number, count: number): Record<string, unknown>[] {
  return Array.from({ length: count }, (_, i) =>
    createLegacyPayload({
      title: `Page ${page} Result ${i + 1}`,
      url: `https://example.com/${page}/${i + 1}`,
    }),
  );
}

/**
 * Complete response body
 */
export function createResponsePayload(
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    query: "test query",
    number_of_results: 0,
    results: [],
    answers: [],
    corrections: [],
    infoboxes: [],
    suggestions: [],
    unresponsive_engines: [],
    ...overrides,
  };
}

export function createInfoboxPayload(
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    infobox: "TypeScript",
    id: "https://en.wikipedia.org/wiki/TypeScript",
    content: "Programming language",
    engine: "wikipedia",
    img_src: "",
    template: "infobox.html",
    title: "",
    thumbnail: "",
    priority: "",
    engines: ["wikipedia"],
    positions: "",
    score: 0,
    category: "general",
    ...overrides,
  };
}

// ============ Fake Transport ============

export interface RecordedRequest {
  url: string;
  form: URLSearchParams;
  params: SearchParameters;
  headers: Record<string, string>;
}

/**
 * Produces a body for a request, or throws to simulate a failure
 */
export type FakeHandler = (params: SearchParameters, callIndex: number) => unknown;

/**
 * In-memory transport. The handler's return value is serialized as the JSON
 * body; strings are sent as they are.
 */
export class FakeTransport implements HttpTransport {
  readonly requests: RecordedRequest[] = [];

  constructor(private readonly handler: FakeHandler) {}

  async postForm(
    url: string,
    form: URLSearchParams,
    headers: Record<string, string>,
  ): Promise<TransportResponse> {
    const params = parseFormData(form);
    const callIndex = this.requests.length;
    this.requests.push({ url, form, params, headers });

    const payload = this.handler(params, callIndex);
    return {
      body: typeof payload === "string" ? payload : JSON.stringify(payload),
      status: 200,
      tookMs: 0,
    };
  }

  /** Page numbers in the order they were requested */
  get pages(): Array<number | undefined> {
    return this.requests.map((request) => request.params.page);
  }
}

/**
 * Transport whose pages are fixed lists of results; pages past the end are
 * empty
 */
export function createPagedTransport(pageSizes: number[]): FakeTransport {
  return new FakeTransport((params) => {
    const page = params.page ?? 1;
    const size = pageSizes[page - 1] ?? 0;
    return createResponsePayload({ query: params.query, results: createPageResults(page, size) });
  });
}

export function networkError(message = "connect ECONNREFUSED"): SearchError {
  return new SearchError("network_error", `Network error: ${message}`);
}

/**
 * Run a function that is expected to throw and return what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}
