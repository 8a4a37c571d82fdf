/**
 * SearXNG API Response Schemas
 *
 * Wire shapes of the SearXNG JSON API. Field names are the ones the backend
 * sends; result shapes are strict so the decoder can tell them apart.
 */

import { z } from "zod";

// ============ Shared Pieces ============

/**
 * Result priority; the backend sends "" for no priority
 */
export const PriorityType = {
  None: "",
  High: "high",
  Low: "low",
} as const;

export type PriorityType = (typeof PriorityType)[keyof typeof PriorityType];

export const PrioritySchema = z.enum([PriorityType.None, PriorityType.High, PriorityType.Low]);

/** Date-time without offset, as written by the backend ("2024-01-15T10:30:00") */
const PublishedDateSchema = z.iso.datetime({ local: true }).nullish();

/** Always a list, even when an engine leaves it out */
const EngineListSchema = z.array(z.string()).default(() => []);
const PositionListSchema = z.array(z.number().int()).default(() => []);

// ============ Result Shapes ============

/**
 * Result shape written by older backend versions
 */
export const LegacyResultSchema = z.strictObject({
  url: z.string().nullish(),
  template: z.string(),
  engine: z.string(),
  parsed_url: z.array(z.string()).nullish(),
  title: z.string(),
  content: z.string(),
  img_src: z.string(),
  thumbnail: z.string(),
  priority: PrioritySchema,
  engines: EngineListSchema,
  positions: PositionListSchema,
  score: z.number(),
  category: z.string(),
  publishedDate: PublishedDateSchema,
  pubdate: z.string().nullish(),
});

/**
 * Current result shape: a superset of the legacy one with media, grouping and
 * metadata fields
 */
export const MainResultSchema = z.strictObject({
  url: z.string().nullish(),
  engine: z.string().nullish(),
  parsed_url: z.array(z.string()).nullish(),
  template: z.string(),
  title: z.string(),
  content: z.string(),
  img_src: z.string(),
  iframe_src: z.string(),
  audio_src: z.string(),
  thumbnail: z.string(),
  publishedDate: PublishedDateSchema,
  // Deprecated upstream in favour of publishedDate; kept optional so newer
  // backends that stop sending it still decode.
  pubdate: z.string().nullish(),
  length: z.iso.duration().nullish(),
  views: z.string(),
  author: z.string(),
  metadata: z.string(),
  priority: PrioritySchema,
  engines: EngineListSchema,
  open_group: z.boolean(),
  close_group: z.boolean(),
  positions: PositionListSchema,
  score: z.number(),
  category: z.string(),
});

export type LegacySearchResult = z.output<typeof LegacyResultSchema>;
export type MainSearchResult = z.output<typeof MainResultSchema>;

// ============ Page-level Pieces ============

/**
 * Instant answer entry. Engines add their own keys, which are kept.
 */
export const AnswerSchema = z.looseObject({
  url: z.string().nullish(),
  engine: z.string().nullish(),
  parsed_url: z.array(z.string()).nullish(),
});

export const AnswerSetSchema = z.array(AnswerSchema);

/** Open key→value map; engines invent arbitrary keys */
const OpenMapSchema = z.record(z.string(), z.unknown());

export const InfoboxSchema = z.object({
  infobox: z.string(),
  id: z.string(),
  content: z.string(),
  urls: z.array(OpenMapSchema).nullish(),
  attributes: z.array(OpenMapSchema).nullish(),
  engine: z.string(),
  url: z.string().nullish(),
  img_src: z.string(),
  template: z.string(),
  parsed_url: z.array(z.string()).nullish(),
  title: z.string(),
  thumbnail: z.string(),
  priority: PrioritySchema,
  engines: EngineListSchema,
  positions: z.string(),
  score: z.number(),
  category: z.string(),
  publishedDate: PublishedDateSchema,
  pubdate: z.string().nullish(),
});

/**
 * Unresponsive engine, sent as the pair [engine, error message]
 */
export const EngineErrorSchema = z
  .tuple([z.string(), z.string()])
  .transform(([engine, message]) => ({ engine, message }));

/**
 * Top-level response. Unknown keys are dropped so newer backends still decode;
 * `results` is validated element by element by the variant parser.
 */
export const SearxngApiResponseSchema = z.object({
  query: z.string(),
  number_of_results: z.number(),
  results: z.array(z.unknown()),
  answers: z.array(AnswerSetSchema),
  corrections: z.array(z.string()),
  infoboxes: z.array(InfoboxSchema),
  suggestions: z.array(z.string()),
  unresponsive_engines: z.array(EngineErrorSchema),
});

export type Answer = z.output<typeof AnswerSchema>;
export type AnswerSet = z.output<typeof AnswerSetSchema>;
export type Infobox = z.output<typeof InfoboxSchema>;
export type SearxngApiResponse = z.output<typeof SearxngApiResponseSchema>;

// ============ Type Guards ============

/**
 * Type guard for a plain JSON object
 */
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
