/**
 * Result Variant Resolution
 *
 * Decides, per result element, which of the two known result shapes the
 * backend sent.
 */

import type { z } from "zod";
import type { SearchResult, ShapeMismatch } from "../core/types";
import { SchemaMismatchError } from "../core/types";
import { isJsonObject, LegacyResultSchema, MainResultSchema } from "./types";

type ShapeFields = Record<string, z.ZodType>;

const LEGACY_FIELDS: ShapeFields = LegacyResultSchema.shape;
const MAIN_FIELDS: ShapeFields = MainResultSchema.shape;

/**
 * Decode one result element into the legacy or the main shape.
 *
 * The legacy shape is tried first and both decodes are strict, so the order
 * decides the outcome: an element that carries any main-only field fails the
 * legacy decode on that field and lands in the main shape, while an element
 * with only legacy fields is accepted as legacy before the main decode (which
 * requires the main-only fields) is attempted. Swapping the order would not
 * change the result today, but it would the moment a main-only field became
 * optional.
 *
 * @param element - One entry of the `results` array
 * @param index - Position of the element, used to locate failures
 * @throws SchemaMismatchError when neither shape accepts the element
 */
export function parseResultVariant(element: unknown, index: number): SearchResult {
  const legacy = LegacyResultSchema.safeParse(element);
  if (legacy.success) {
    return { kind: "legacy", ...legacy.data };
  }

  const main = MainResultSchema.safeParse(element);
  if (main.success) {
    return { kind: "main", ...main.data };
  }

  const fields: Record<string, unknown> = isJsonObject(element) ? element : {};
  const unknownFields = Object.keys(fields).filter(
    (key) => !Object.hasOwn(LEGACY_FIELDS, key) && !Object.hasOwn(MAIN_FIELDS, key),
  );

  throw new SchemaMismatchError(`results[${index}]`, unknownFields, [
    summarizeMismatch("legacy", LEGACY_FIELDS, fields, legacy.error),
    summarizeMismatch("main", MAIN_FIELDS, fields, main.error),
  ]);
}

/**
 * Split a failed decode into missing required fields and present-but-invalid
 * fields
 */
export function summarizeMismatch(
  shape: ShapeMismatch["shape"],
  shapeFields: ShapeFields,
  value: Record<string, unknown>,
  error: z.ZodError,
): ShapeMismatch {
  const missingFields = Object.entries(shapeFields)
    .filter(([key, schema]) => value[key] === undefined && !schema.safeParse(undefined).success)
    .map(([key]) => key);

  const invalidFields: string[] = [];
  for (const issue of error.issues) {
    const [head] = issue.path;
    if (typeof head !== "string" || value[head] === undefined) {
      continue;
    }
    const path = issue.path.map(String).join(".");
    if (!invalidFields.includes(path)) {
      invalidFields.push(path);
    }
  }

  return { shape, missingFields, invalidFields };
}
