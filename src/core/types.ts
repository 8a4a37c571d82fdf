/**
 * Core search types and error handling
 */

import type {
  AnswerSet,
  Infobox,
  LegacySearchResult,
  MainSearchResult,
} from "../providers/types";

export type ResultShape = "legacy" | "main";

/**
 * A decoded search result.
 *
 * Upstream engines do not say which shape they emit, so the decoder tags each
 * element with the shape it was resolved to (see `parseResultVariant`).
 */
export type SearchResult =
  | ({ kind: "legacy" } & LegacySearchResult)
  | ({ kind: "main" } & MainSearchResult);

export interface EngineError {
  engine: string;
  message: string;
}

/**
 * One decoded page returned by the backend
 */
export interface SearchResponse {
  /** Query echoed back by the backend */
  query: string;
  /** Estimated total; not related to `results.length` */
  number_of_results: number;
  results: SearchResult[];
  answers: AnswerSet[];
  corrections: string[];
  infoboxes: Infobox[];
  suggestions: string[];
  /** Engines that failed or timed out while serving this page */
  unresponsive_engines: EngineError[];
}

export type SearchFailureReason =
  | "network_error"
  | "api_error"
  | "rate_limit"
  | "decode_error"
  | "schema_mismatch"
  | "config_error"
  | "unknown";

/** Reasons produced by the HTTP layer; these are safe to retry */
export const TRANSPORT_FAILURE_REASONS: readonly SearchFailureReason[] = [
  "network_error",
  "api_error",
  "rate_limit",
];

/**
 * Error thrown when a search request or its decoding fails
 */
export class SearchError extends Error {
  reason: SearchFailureReason;
  statusCode?: number;

  constructor(reason: SearchFailureReason, message: string, statusCode?: number) {
    super(message);
    this.name = "SearchError";
    this.reason = reason;
    this.statusCode = statusCode;
  }
}

/**
 * How one candidate shape disagreed with the payload
 */
export interface ShapeMismatch {
  shape: ResultShape | "response";
  /** Required fields the payload does not carry */
  missingFields: string[];
  /** Fields present with a value the shape does not accept */
  invalidFields: string[];
}

/**
 * Thrown when a payload does not fit any known schema.
 *
 * `location` is `response` for the top-level object or `results[i]` for a
 * single result element.
 */
export class SchemaMismatchError extends SearchError {
  location: string;
  unknownFields: string[];
  mismatches: ShapeMismatch[];

  constructor(location: string, unknownFields: string[], mismatches: ShapeMismatch[]) {
    super("schema_mismatch", describeMismatch(location, unknownFields, mismatches));
    this.name = "SchemaMismatchError";
    this.location = location;
    this.unknownFields = unknownFields;
    this.mismatches = mismatches;
  }
}

function describeMismatch(
  location: string,
  unknownFields: string[],
  mismatches: ShapeMismatch[],
): string {
  const shapes = mismatches.map((m) => m.shape).join(" or ");
  const parts = [`${location} does not match the ${shapes} shape`];

  if (unknownFields.length > 0) {
    parts.push(`unknown fields: ${unknownFields.join(", ")}`);
  }
  for (const mismatch of mismatches) {
    if (mismatch.missingFields.length > 0) {
      parts.push(`missing for ${mismatch.shape}: ${mismatch.missingFields.join(", ")}`);
    }
    if (mismatch.invalidFields.length > 0) {
      parts.push(`invalid for ${mismatch.shape}: ${mismatch.invalidFields.join(", ")}`);
    }
  }

  return parts.join("; ");
}

/**
 * Whether an error came from the HTTP layer rather than from decoding
 */
export function isTransportFailure(error: unknown): error is SearchError {
  return error instanceof SearchError && TRANSPORT_FAILURE_REASONS.includes(error.reason);
}
