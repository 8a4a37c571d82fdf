/**
 * Search request parameters and their form encoding
 *
 * SearchRequestBuilder is an immutable value: every `with*` call returns a new
 * builder and leaves the receiver untouched, so one builder can be reused as
 * the template for many page requests.
 */

import { z } from "zod";
import { SearchError } from "./types";

/** Response formats the decoder understands */
export type ResponseFormat = "json";

const LanguageTagSchema = z
  .string()
  .regex(/^[A-Za-z]{2,8}(-[A-Za-z0-9]{1,8})*$/)
  .brand<"LanguageTag">();

/** BCP-47-like language tag such as "en", "de-CH" or "zh-Hant-TW" */
export type LanguageTag = z.output<typeof LanguageTagSchema>;

/**
 * Validate a language tag
 *
 * @throws SearchError with reason "config_error" for malformed tags
 */
export function parseLanguageTag(value: string): LanguageTag {
  const result = LanguageTagSchema.safeParse(value);
  if (!result.success) {
    throw new SearchError("config_error", `Invalid language tag: "${value}"`);
  }
  return result.data;
}

export interface SearchParameters {
  readonly query: string;
  readonly format: ResponseFormat;
  /** 1-based; absent means the backend default */
  readonly page?: number;
  readonly categories?: readonly string[];
  readonly engines?: readonly string[];
  readonly language?: LanguageTag;
  readonly resultsOnNewTab?: number;
  readonly imageProxy?: boolean;
  readonly autocomplete?: string;
  /** 0 = off, 1 = moderate, 2 = strict */
  readonly safeSearch?: number;
  readonly theme?: string;
}

export class SearchRequestBuilder {
  private readonly params: SearchParameters;

  constructor(query: string | SearchParameters, format: ResponseFormat = "json") {
    this.params = Object.freeze(typeof query === "string" ? { query, format } : { ...query });
  }

  get parameters(): SearchParameters {
    return this.params;
  }

  /** Set or overwrite the page number. The backend decides what is in range. */
  withPage(page: number): SearchRequestBuilder {
    return this.with({ page });
  }

  /** Replace the whole parameter set */
  withParameters(params: SearchParameters): SearchRequestBuilder {
    return new SearchRequestBuilder(params);
  }

  withCategories(categories: readonly string[]): SearchRequestBuilder {
    return this.with({ categories: Object.freeze([...categories]) });
  }

  withEngines(engines: readonly string[]): SearchRequestBuilder {
    return this.with({ engines: Object.freeze([...engines]) });
  }

  withLanguage(language: LanguageTag): SearchRequestBuilder {
    return this.with({ language });
  }

  withSafeSearch(safeSearch: number): SearchRequestBuilder {
    return this.with({ safeSearch });
  }

  withTheme(theme: string): SearchRequestBuilder {
    return this.with({ theme });
  }

  withAutocomplete(autocomplete: string): SearchRequestBuilder {
    return this.with({ autocomplete });
  }

  withImageProxy(imageProxy: boolean): SearchRequestBuilder {
    return this.with({ imageProxy });
  }

  withResultsOnNewTab(resultsOnNewTab: number): SearchRequestBuilder {
    return this.with({ resultsOnNewTab });
  }

  build(): SearchParameters {
    return this.params;
  }

  private with(patch: Partial<SearchParameters>): SearchRequestBuilder {
    return new SearchRequestBuilder({ ...this.params, ...patch });
  }
}

/**
 * Encode parameters as the form body of a search POST.
 * Fields keep the backend's order; empty lists are left out.
 */
export function toFormData(params: SearchParameters): URLSearchParams {
  const form = new URLSearchParams();
  form.append("q", params.query);
  form.append("format", params.format);

  if (params.page !== undefined) {
    form.append("pageno", String(params.page));
  }
  if (params.categories?.length) {
    form.append("categories", params.categories.join(","));
  }
  if (params.engines?.length) {
    form.append("engines", params.engines.join(","));
  }
  if (params.language !== undefined) {
    form.append("language", params.language);
  }
  if (params.resultsOnNewTab !== undefined) {
    form.append("results_on_new_tab", String(params.resultsOnNewTab));
  }
  if (params.imageProxy !== undefined) {
    form.append("image_proxy", String(params.imageProxy));
  }
  if (params.autocomplete !== undefined) {
    form.append("autocomplete", params.autocomplete);
  }
  if (params.safeSearch !== undefined) {
    form.append("safesearch", String(params.safeSearch));
  }
  if (params.theme !== undefined) {
    form.append("theme", params.theme);
  }

  return form;
}

function splitList(value: string | null): string[] | undefined {
  if (!value) {
    return undefined;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseInteger(field: string, value: string | null): number | undefined {
  if (value === null) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new SearchError("config_error", `Invalid ${field}: "${value}" is not an integer`);
  }
  return parsed;
}

function parseBoolean(field: string, value: string | null): boolean | undefined {
  if (value === null) {
    return undefined;
  }
  if (value !== "true" && value !== "false") {
    throw new SearchError("config_error", `Invalid ${field}: "${value}" is not a boolean`);
  }
  return value === "true";
}

/**
 * Inverse of `toFormData`
 *
 * @throws SearchError with reason "config_error" for values that do not parse
 */
export function parseFormData(form: URLSearchParams): SearchParameters {
  const format = form.get("format");
  if (format !== "json") {
    throw new SearchError("config_error", `Unsupported response format: "${format ?? ""}"`);
  }

  const page = parseInteger("pageno", form.get("pageno"));
  const categories = splitList(form.get("categories"));
  const engines = splitList(form.get("engines"));
  const language = form.get("language");
  const resultsOnNewTab = parseInteger("results_on_new_tab", form.get("results_on_new_tab"));
  const imageProxy = parseBoolean("image_proxy", form.get("image_proxy"));
  const autocomplete = form.get("autocomplete");
  const safeSearch = parseInteger("safesearch", form.get("safesearch"));
  const theme = form.get("theme");

  return {
    query: form.get("q") ?? "",
    format,
    ...(page !== undefined && { page }),
    ...(categories && { categories }),
    ...(engines && { engines }),
    ...(language !== null && { language: parseLanguageTag(language) }),
    ...(resultsOnNewTab !== undefined && { resultsOnNewTab }),
    ...(imageProxy !== undefined && { imageProxy }),
    ...(autocomplete !== null && { autocomplete }),
    ...(safeSearch !== undefined && { safeSearch }),
    ...(theme !== null && { theme }),
  };
}
