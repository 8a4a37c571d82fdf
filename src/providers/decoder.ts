/**
 * SearXNG Response Decoder
 *
 * Turns the raw body of one page into a typed SearchResponse.
 */

import type { z } from "zod";
import { createLogger } from "../core/logger";
import type { SearchResponse } from "../core/types";
import { SchemaMismatchError, SearchError } from "../core/types";
import { isJsonObject, SearxngApiResponseSchema } from "./types";
import { parseResultVariant, summarizeMismatch } from "./variant";

const log = createLogger("Decoder");

const RESPONSE_FIELDS: Record<string, z.ZodType> = SearxngApiResponseSchema.shape;

/**
 * Decode one page payload
 *
 * Unknown top-level fields are ignored. Every result element must match one
 * of the known result shapes.
 *
 * @param body - Response body as text
 * @throws SearchError with reason "decode_error" when the body is not JSON
 * @throws SchemaMismatchError when the payload does not fit the response schema
 */
export function decodeSearchResponse(body: string): SearchResponse {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    throw new SearchError(
      "decode_error",
      `Invalid JSON response: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const parsed = SearxngApiResponseSchema.safeParse(payload);
  if (!parsed.success) {
    const fields: Record<string, unknown> = isJsonObject(payload) ? payload : {};
    throw new SchemaMismatchError("response", [], [
      summarizeMismatch("response", RESPONSE_FIELDS, fields, parsed.error),
    ]);
  }

  const { results, ...rest } = parsed.data;
  const decoded = results.map((element, index) => parseResultVariant(element, index));

  log.debug(`Decoded ${decoded.length} results for "${rest.query}"`);

  return { ...rest, results: decoded };
}
