/**
 * SearXNG Client
 *
 * Binds a backend base URL and a shared transport to the request builder,
 * the response decoder and the pagination engine.
 */

import { createLogger } from "../core/logger";
import type { PaginationConfig } from "../core/pagination";
import { PaginationRetryEngine } from "../core/pagination";
import type { SearchParameters } from "../core/request";
import { SearchRequestBuilder, toFormData } from "../core/request";
import type { SearchResponse, SearchResult } from "../core/types";
import { decodeSearchResponse } from "./decoder";
import type { HttpTransport } from "./utils";
import { buildSearchUrl } from "./utils";

const log = createLogger("SearXNG");

/** Sent as User-Agent on every request unless overridden */
export const DEFAULT_USER_AGENT = "searxng-pager/0.1.0";

/** Parameters a client applies to every new search */
export type SearchDefaults = Partial<Omit<SearchParameters, "query" | "format" | "page">>;

export interface SearxngClientOptions {
  /** Base URL of the instance, e.g. "https://search.example.org" */
  baseUrl: string;

  /** Shared transport; create one per process and hand it to every client */
  transport: HttpTransport;

  userAgent?: string;

  /** Applied to every builder returned by `search()` */
  defaults?: SearchDefaults;

  pagination?: PaginationConfig;
}

export class SearxngClient {
  /** Full URL of the search endpoint */
  readonly endpoint: string;

  private readonly transport: HttpTransport;
  private readonly headers: Record<string, string>;
  private readonly defaults: SearchDefaults;
  private readonly pagination: PaginationRetryEngine;

  constructor(options: SearxngClientOptions) {
    this.endpoint = buildSearchUrl(options.baseUrl);
    this.transport = options.transport;
    this.defaults = options.defaults ?? {};
    this.headers = {
      Accept: "application/json",
      "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
    };
    this.pagination = new PaginationRetryEngine(
      (params) => this.sendParameters(params),
      options.pagination,
    );
  }

  /**
   * Start a new search with the client's defaults applied
   */
  search(query: string): SearchRequestBuilder {
    return new SearchRequestBuilder({ ...this.defaults, query, format: "json" });
  }

  /**
   * Send one page request and decode it
   *
   * @throws SearchError for transport failures, non-JSON bodies and schema
   *   mismatches
   */
  async send(request: SearchRequestBuilder): Promise<SearchResponse> {
    return await this.sendParameters(request.build());
  }

  /**
   * Collect `num` results across pages
   *
   * Transport failures are retried (see PaginationRetryEngine); wrap the call
   * in a deadline if the backend may stay unreachable.
   */
  async sendGetNum(request: SearchRequestBuilder, num: number): Promise<SearchResult[]> {
    return await this.pagination.collect(request, num);
  }

  private async sendParameters(params: SearchParameters): Promise<SearchResponse> {
    log.debug(`POST ${this.endpoint} q="${params.query}" page=${params.page ?? "default"}`);

    const { body, tookMs } = await this.transport.postForm(
      this.endpoint,
      toFormData(params),
      this.headers,
    );

    log.debug(`Page ${params.page ?? "default"} answered in ${tookMs}ms`);
    return decodeSearchResponse(body);
  }
}
