/**
 * Zod schemas for configuration validation
 */

import { z } from "zod";

const LANGUAGE_TAG = /^[A-Za-z]{2,8}(-[A-Za-z0-9]{1,8})*$/;

// Parameters applied to every search unless the caller overrides them
export const SearchDefaultsSchema = z.object({
  categories: z.array(z.string().min(1)).optional(),
  engines: z.array(z.string().min(1)).optional(),
  language: z.string().regex(LANGUAGE_TAG, "Invalid language tag").optional(),
  safeSearch: z.number().int().min(0).max(2).optional(),
  theme: z.string().min(1).optional(),
  autocomplete: z.string().min(1).optional(),
  imageProxy: z.boolean().optional(),
  resultsOnNewTab: z.number().int().min(0).max(1).optional(),
});

export const PaginationConfigSchema = z.object({
  emptyRetries: z.number().int().positive().optional(),
  maxTransportRetries: z.number().int().nonnegative().optional(),
});

// Main configuration schema (uses passthrough to preserve extra fields)
export const SearxngPagerConfigSchema = z
  .object({
    baseUrl: z.string().url(),
    userAgent: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
    defaults: SearchDefaultsSchema.optional(),
    pagination: PaginationConfigSchema.optional(),
  })
  .passthrough();

// CLI input schema
export const CliInputSchema = z
  .object({
    query: z.string().min(1),
    num: z.number().int().positive().optional(),
    page: z.number().int().positive().optional(),
    categories: z.array(z.string().min(1)).min(1).optional(),
    engines: z.array(z.string().min(1)).min(1).optional(),
    language: z.string().regex(LANGUAGE_TAG, "Invalid language tag").optional(),
    safeSearch: z.number().int().min(0).max(2).optional(),
    baseUrl: z.string().url().optional(),
    configPath: z.string().min(1).optional(),
    json: z.boolean().optional(),
  })
  .refine((input) => input.num === undefined || input.page === undefined, {
    message: "--num and --page cannot be combined",
  });

// Export inferred types from schemas
export type SearxngPagerConfig = z.infer<typeof SearxngPagerConfigSchema>;
export type ValidatedSearchDefaults = z.infer<typeof SearchDefaultsSchema>;
export type ValidatedCliInput = z.infer<typeof CliInputSchema>;

/**
 * Validate configuration against schema
 * @throws ZodError if validation fails
 */
export function validateConfig(config: unknown): SearxngPagerConfig {
  return SearxngPagerConfigSchema.parse(config);
}

/**
 * Validate configuration safely (returns result object instead of throwing)
 */
export function validateConfigSafe(config: unknown):
  | {
      success: true;
      data: SearxngPagerConfig;
    }
  | {
      success: false;
      error: z.ZodError;
    } {
  const result = SearxngPagerConfigSchema.safeParse(config);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Validate CLI input against schema
 * @throws ZodError if validation fails
 */
export function validateCliInput(input: unknown): ValidatedCliInput {
  return CliInputSchema.parse(input);
}

/**
 * Format Zod validation errors into human-readable messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.issues.map((err) => {
    const path = err.path.map(String).join(".");
    return path ? `${path}: ${err.message}` : err.message;
  });
}
