/**
 * Pagination and Retry
 *
 * Satisfies "give me at least N results" by walking pages 1, 2, 3... one at a
 * time. Two retry policies apply:
 *
 * - an empty page is asked for again, up to `emptyRetries` times in total;
 *   when every attempt comes back empty the backend is considered exhausted
 *   and whatever was collected so far is returned
 * - a transport failure is retried on the same page without touching the
 *   empty budget. This is unbounded unless `maxTransportRetries` is set, so a
 *   caller that needs a deadline must impose one around `collect`.
 *
 * Decode failures are never retried.
 */

import { createLogger } from "./logger";
import type { SearchParameters, SearchRequestBuilder } from "./request";
import type { SearchResponse, SearchResult } from "./types";
import { isTransportFailure } from "./types";

const log = createLogger("Pagination");

/**
 * Fetches and decodes one page
 */
export type PageFetcher = (params: SearchParameters) => Promise<SearchResponse>;

/**
 * Retry configuration
 */
export interface PaginationConfig {
  /** Attempts per page before an all-empty page ends the walk */
  emptyRetries?: number;

  /**
   * Consecutive transport failures tolerated for one request before the last
   * error is thrown. Unlimited by default.
   */
  maxTransportRetries?: number;
}

/**
 * Default retry configuration
 */
export const DEFAULT_PAGINATION_CONFIG: Required<PaginationConfig> = {
  emptyRetries: 3,
  maxTransportRetries: Number.POSITIVE_INFINITY,
};

export class PaginationRetryEngine {
  private readonly emptyRetries: number;
  private readonly maxTransportRetries: number;

  constructor(
    private readonly fetchPage: PageFetcher,
    config: PaginationConfig = {},
  ) {
    this.emptyRetries = config.emptyRetries ?? DEFAULT_PAGINATION_CONFIG.emptyRetries;
    this.maxTransportRetries =
      config.maxTransportRetries ?? DEFAULT_PAGINATION_CONFIG.maxTransportRetries;
  }

  /**
   * Collect at least `num` results, starting at page 1
   *
   * @returns Results in page order, truncated to `num`. Shorter than `num`
   *   only when the backend ran out of results.
   * @throws SearchError for decode failures, or for transport failures once
   *   `maxTransportRetries` is exceeded
   */
  async collect(request: SearchRequestBuilder, num: number): Promise<SearchResult[]> {
    const collected: SearchResult[] = [];
    let page = 1;

    while (collected.length < num) {
      const results = await this.fetchNonEmptyPage(request.withPage(page));
      if (results === null) {
        log.debug(`Backend exhausted at page ${page} with ${collected.length} results`);
        break;
      }

      collected.push(...results);
      page += 1;
    }

    return collected.slice(0, num);
  }

  /**
   * Ask for one page until it has results
   *
   * @returns The page's results, or null when every attempt was empty
   */
  private async fetchNonEmptyPage(request: SearchRequestBuilder): Promise<SearchResult[] | null> {
    const { page } = request.parameters;

    for (let attempt = 1; attempt <= this.emptyRetries; attempt++) {
      const response = await this.sendWithTransportRetry(request);
      if (response.results.length > 0) {
        return response.results;
      }
      log.debug(`Page ${page} returned no results (attempt ${attempt}/${this.emptyRetries})`);
    }

    return null;
  }

  private async sendWithTransportRetry(request: SearchRequestBuilder): Promise<SearchResponse> {
    let failures = 0;

    for (;;) {
      try {
        return await this.fetchPage(request.build());
      } catch (error) {
        if (!isTransportFailure(error)) {
          throw error;
        }

        failures += 1;
        if (failures > this.maxTransportRetries) {
          throw error;
        }

        log.warn(
          `Page ${request.parameters.page} failed (${error.reason}): ${error.message}. Retrying...`,
        );
      }
    }
  }
}
