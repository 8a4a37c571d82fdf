// Public API surface for consumers importing the library (non-CLI).

export type { BootstrapOptions, Bootstrapped } from "../bootstrap";
export { bootstrap, createClient } from "../bootstrap";
// Config helpers
export { getConfigPaths, loadConfig } from "../config/load";
export type { SearxngPagerConfig } from "../config/validation";
export { validateConfig } from "../config/validation";
export type { Logger, LogLevel } from "../core/logger";
export { createLogger } from "../core/logger";
export type { PageFetcher, PaginationConfig } from "../core/pagination";
export { PaginationRetryEngine } from "../core/pagination";
export type { LanguageTag, ResponseFormat, SearchParameters } from "../core/request";
export { parseFormData, parseLanguageTag, SearchRequestBuilder, toFormData } from "../core/request";
// Types
export type {
  EngineError,
  ResultShape,
  SearchFailureReason,
  SearchResponse,
  SearchResult,
  ShapeMismatch,
} from "../core/types";
export { isTransportFailure, SchemaMismatchError, SearchError } from "../core/types";
export { decodeSearchResponse } from "../providers/decoder";
export type { SearchDefaults, SearxngClientOptions } from "../providers/searchxng";
export { DEFAULT_USER_AGENT, SearxngClient } from "../providers/searchxng";
export type {
  Answer,
  AnswerSet,
  Infobox,
  LegacySearchResult,
  MainSearchResult,
} from "../providers/types";
export { PriorityType } from "../providers/types";
export type { FetchTransportOptions, HttpTransport, TransportResponse } from "../providers/utils";
export { FetchTransport } from "../providers/utils";
export { parseResultVariant } from "../providers/variant";
