/**
 * Zod schemas for character tables and configuration files
 *
 * Note: Uses zod v4 syntax.
 */

import { z } from 'zod/v4';

const MAX_CODEPOINT = 0x10ffff;

/** Codepoint value */
export const CodepointSchema = z.number().int().min(0).max(MAX_CODEPOINT);

/** Approximation key: exactly one codepoint */
export const ApproximationKeySchema = z.string().refine(
  (key) => Array.from(key).length === 1,
  { message: 'approximation keys must be a single character' },
);

/** Character → replacement mapping */
export const ApproximationMappingSchema = z.record(ApproximationKeySchema, z.string());

/** resources/characters/approximations/*.yaml */
export const ApproximationFileSchema = z.object({
  locale: z.string().min(1),
  description: z.string().optional(),
  approximations: ApproximationMappingSchema,
});

/** resources/characters/strippable.yaml */
export const StrippableFileSchema = z.object({
  ranges: z
    .array(z.tuple([CodepointSchema, CodepointSchema]))
    .refine((ranges) => ranges.every(([first, last]) => first <= last), {
      message: 'range start must not exceed range end',
    }),
});

/** Whether the host accepts `tag` as a BCP 47 language tag */
export function isLocaleTag(tag: string): boolean {
  try {
    Intl.getCanonicalLocales(tag);
    return true;
  } catch {
    return false;
  }
}

/** BCP 47 tag for locale-sensitive case mapping */
export const CaseLocaleSchema = z.string().min(1).refine(isLocaleTag, {
  message: 'must be a valid BCP 47 language tag',
});

export const BackendNameSchema = z.enum(['standard', 'locale', 'whatwg']);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/** .slugwright.yaml (snake_case on disk) */
export const SlugwrightConfigSchema = z.object({
  backend: BackendNameSchema.optional(),
  case_locale: CaseLocaleSchema.optional(),
  ascii: z.boolean().optional(),
  max_bytes: z.number().int().nonnegative().optional(),
  locale: z.string().min(1).optional(),
  log_level: LogLevelSchema.optional(),
  debug: z
    .object({
      enabled: z.boolean().optional(),
      log_file: z.string().min(1).optional(),
    })
    .optional(),
  approximations: z.record(z.string().min(1), ApproximationMappingSchema).optional(),
});

export type ApproximationFile = z.infer<typeof ApproximationFileSchema>;
export type StrippableFile = z.infer<typeof StrippableFileSchema>;
export type RawSlugwrightConfig = z.infer<typeof SlugwrightConfigSchema>;
